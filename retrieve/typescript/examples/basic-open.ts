/**
 * Basic Open Example
 *
 * Opens an http resource, prints the response metadata and body, then reads
 * and writes a local file through the same entry point.
 */

import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import {
  ConsoleLogger,
  HttpOpenOptionsBuilder,
  LogLevel,
  RetrieveErrorKind,
  isRetrieveError,
  open,
} from '../src';

/**
 * Example 1: GET with cookies and a custom header
 */
async function httpExample(): Promise<void> {
  console.log('=== HTTP Example ===\n');

  const options = new HttpOpenOptionsBuilder()
    .header('Accept', 'text/html')
    .cookie('session', 'test-session')
    .timeout(5000)
    .logger(new ConsoleLogger(LogLevel.Debug))
    .build();

  const resource = await open('http://example.com/', options);
  try {
    console.log(`Status: ${resource.response?.status} ${resource.response?.reason}`);
    console.log(`Final URI: ${resource.uri.href}`);
    console.log(`Permanent URI: ${resource.permanentUri.href}`);
    console.log((await resource.read()).toString());
  } finally {
    await resource.close();
  }
}

/**
 * Example 2: Redirect policy
 */
async function redirectExample(): Promise<void> {
  console.log('\n=== Redirect Example ===\n');

  try {
    await open('http://example.com/moved', { maxRedirects: 2 });
  } catch (error) {
    if (isRetrieveError(error) && error.kind === RetrieveErrorKind.TooManyRedirects) {
      console.log(`Gave up after status ${error.status}`);
      return;
    }
    throw error;
  }
}

/**
 * Example 3: Files
 */
async function fileExample(): Promise<void> {
  console.log('\n=== File Example ===\n');

  const uri = pathToFileURL(path.join(os.tmpdir(), 'retrieve-example.txt'));

  const writer = await open(uri, { mode: ['write', 'create'] });
  console.log(`Wrote ${await writer.write('Write some code.\n')} bytes`);
  await writer.close();

  const reader = await open(uri);
  console.log((await reader.read()).toString());
  console.log(`Modified: ${String(reader.metadata.modifiedTime)}`);
  await reader.close();
}

async function main(): Promise<void> {
  await httpExample();
  await redirectExample();
  await fileExample();
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    console.error('Example failed:', error);
    process.exitCode = 1;
  });
}

export { httpExample, redirectExample, fileExample };
