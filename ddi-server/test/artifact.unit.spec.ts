import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { artifactSize, isNotFound } from '../src/routes/ddi';

describe('artifactSize', () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ddi-artifact-'));
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it('should return the byte length of an existing artifact', async () => {
		const firmwarePath = path.join(tmpDir, 'firmware.bin');
		await fs.writeFile(firmwarePath, Buffer.alloc(1500));

		await expect(artifactSize(firmwarePath)).resolves.toBe(1500);
	});

	it('should return 0 when the artifact does not exist', async () => {
		await expect(artifactSize(path.join(tmpDir, 'missing.bin'))).resolves.toBe(0);
	});

	it('should rethrow other file system errors', async () => {
		// A path below a regular file fails with ENOTDIR
		const file = path.join(tmpDir, 'plain');
		await fs.writeFile(file, 'x');

		await expect(artifactSize(path.join(file, 'firmware.bin'))).rejects.toMatchObject({ code: 'ENOTDIR' });
	});
});

describe('isNotFound', () => {
	it('should recognise the rejection of a failed stat', async () => {
		const error: unknown = await fs.stat(path.join(os.tmpdir(), 'ddi-no-such-file', 'x.bin')).catch((e: unknown) => e);

		expect(isNotFound(error)).toBe(true);
	});

	it('should go by the error code alone', () => {
		expect(isNotFound({ code: 'ENOENT' })).toBe(true);
		expect(isNotFound({ code: 'EACCES' })).toBe(false);
		expect(isNotFound(new Error('ENOENT'))).toBe(false);
		expect(isNotFound(null)).toBe(false);
		expect(isNotFound('ENOENT')).toBe(false);
	});
});
