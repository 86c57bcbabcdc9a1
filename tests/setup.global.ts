import { afterAll } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

process.on('unhandledRejection', (reason: unknown) => {
  console.error('UNHANDLED_REJECTION', reason);
});

// Fixture logs are written here; removed after each test file.
const testDataRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'thermite-test-env-'));
process.env.THERMITE_TEST_ROOT = testDataRoot;

// Keep the developer's shell from changing option defaults under test.
delete process.env.THERMITE_NAME_DECODING;
delete process.env.THERMITE_DUPLICATE_POLICY;

afterAll(async () => {
  try {
    await fs.promises.rm(testDataRoot, { recursive: true, force: true });
  } catch (e) {
    console.error('Failed to cleanup test sandbox', e);
  }
});
