// File Center HTTP Client -- Example
//
// Walks through both file lifetimes against a running server:
//   1. Health check (GET /health)
//   2. Upload a perennial file (POST /files) -> token
//   3. Upload the same bytes again -> same token (deduplicated)
//   4. Download the perennial file (GET /files/:token), twice
//   5. Upload a temporary file (POST /files?temporary=true)
//   6. Download it once -> 200, again -> 404
//   7. Delete the perennial file (DELETE /files/:token)
//
// Usage:
//   tsx examples/client.ts
//
// Environment variables:
//   SERVER_URL  (optional) -- File center URL (default: http://localhost:3000)
//   FILE_PATH   (optional) -- Path to a file to upload (default: creates a test file)

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';

// ---------------------------------------------------------------------------
// Configuration from environment
// ---------------------------------------------------------------------------

const SERVER_URL = process.env.SERVER_URL ?? 'http://localhost:3000';
const FILE_PATH = process.env.FILE_PATH;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface UploadResponse {
  success: boolean;
  token: string;
  temporary: boolean;
}

function log(step: string, message: string): void {
  console.log(`\n[${'='.repeat(60)}]`);
  console.log(`[STEP] ${step}`);
  console.log(`       ${message}`);
  console.log(`[${'='.repeat(60)}]`);
}

function logDetail(label: string, value: string): void {
  console.log(`  ${label}: ${value}`);
}

async function upload(content: Buffer, fileName: string, temporary: boolean): Promise<string> {
  const formData = new FormData();
  formData.append('file', new Blob([new Uint8Array(content)]), fileName);

  const res = await fetch(`${SERVER_URL}/files?temporary=${temporary}`, {
    method: 'POST',
    body: formData,
  });
  logDetail('Status', String(res.status));

  const body = (await res.json()) as UploadResponse;
  if (res.status !== 200 || !body.success) {
    throw new Error(`Upload failed: ${JSON.stringify(body)}`);
  }
  logDetail('Token', body.token);
  return body.token;
}

async function download(token: string): Promise<Buffer | null> {
  const res = await fetch(`${SERVER_URL}/files/${token}`);
  logDetail('Status', String(res.status));
  if (res.status !== 200) {
    return null;
  }
  logDetail('Content-Type', res.headers.get('Content-Type') ?? 'unknown');
  logDetail('Content-Length', res.headers.get('Content-Length') ?? 'unknown');
  return Buffer.from(await res.arrayBuffer());
}

// ---------------------------------------------------------------------------
// Main flow
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  console.log('\n  File Center HTTP Client -- Example');
  console.log('  ==================================\n');
  console.log(`  Server: ${SERVER_URL}`);

  // ---- Step 1: Health check ----
  log('1/7', 'Checking server health (GET /health)');

  const healthRes = await fetch(`${SERVER_URL}/health`);
  const healthBody = (await healthRes.json()) as Record<string, unknown>;

  logDetail('Status', String(healthRes.status));
  logDetail('Server status', String(healthBody.status));
  logDetail('Store', String(healthBody.store));
  logDetail('Dependencies', JSON.stringify(healthBody.dependencies));

  if (healthRes.status !== 200 || healthBody.status !== 'healthy') {
    console.error('\nServer is not healthy. Start the server and try again.');
    process.exit(1);
  }

  // Prepare a file to upload
  let fileBuffer: Buffer;
  let fileName: string;
  if (FILE_PATH) {
    fileBuffer = readFileSync(FILE_PATH);
    fileName = basename(FILE_PATH);
    logDetail('File', `${FILE_PATH} (${fileBuffer.length} bytes)`);
  } else {
    fileBuffer = Buffer.from(`file center test file created at ${new Date().toISOString()}`);
    fileName = 'test.txt';
    logDetail('File', `Generated test file (${fileBuffer.length} bytes)`);
  }

  // ---- Step 2: Perennial upload ----
  log('2/7', 'Uploading a perennial file (POST /files)');
  const token = await upload(fileBuffer, fileName, false);

  // ---- Step 3: Same bytes again ----
  log('3/7', 'Uploading the same bytes again (POST /files)');
  const again = await upload(fileBuffer, fileName, false);
  logDetail('Deduplicated', again === token ? 'YES -- same token' : 'NO -- new token issued');

  // ---- Step 4: Download perennial ----
  log('4/7', 'Downloading the perennial file twice (GET /files/:token)');
  for (let attempt = 1; attempt <= 2; attempt++) {
    const bytes = await download(token);
    const match = bytes !== null && Buffer.compare(fileBuffer, bytes) === 0;
    logDetail(`Round-trip match #${attempt}`, match ? 'YES' : 'NO');
  }

  // ---- Step 5: Temporary upload ----
  log('5/7', 'Uploading a temporary file (POST /files?temporary=true)');
  const temporaryToken = await upload(Buffer.from('HI!!!'), 'once.txt', true);

  // ---- Step 6: Download temporary twice ----
  log('6/7', 'Downloading the temporary file twice (GET /files/:token)');
  const first = await download(temporaryToken);
  logDetail('First download', first ? first.toString('utf-8') : 'not found');
  const second = await download(temporaryToken);
  logDetail('Second download', second ? 'unexpectedly succeeded' : 'not found (single-use)');

  // ---- Step 7: Delete ----
  log('7/7', 'Deleting the perennial file (DELETE /files/:token)');
  const deleteRes = await fetch(`${SERVER_URL}/files/${token}`, { method: 'DELETE' });
  logDetail('Status', String(deleteRes.status));

  console.log('\n  Done.\n');
}

main().catch((error: unknown) => {
  console.error('\nFATAL:', error instanceof Error ? error.message : error);
  process.exit(1);
});
