import { spawnSync } from 'node:child_process';
import { existsSync, mkdtempSync, rmSync, statSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { storeKeyToHex, type StoreKey } from '../crypto/keys.js';
import { DecryptionError } from '../errors.js';

/**
 * Size of the unencrypted header at the start of the store file
 */
export const PLAINTEXT_HEADER_SIZE = 32;

export const PLAINTEXT_FILE_NAME = 'plaintext.db';

/**
 * Everything the external engine needs to export a plaintext copy
 */
export interface ExportRequest {
  sourcePath: string;
  destinationPath: string;
  /** Hex-encoded key ∥ salt */
  hexKey: string;
  plaintextHeaderSize: number;
}

export interface ExportResult {
  /** Process exit status; null when it was killed by a signal */
  status: number | null;
  stderr: string;
}

/**
 * Runs the encrypted-database engine's export
 */
export type StoreExporter = (request: ExportRequest) => ExportResult;

function sqlQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * SQL fed to the engine's shell: key the source, attach an unkeyed
 * destination and export into it.
 */
export function buildExportScript(request: ExportRequest): string {
  return [
    `PRAGMA key="x'${request.hexKey}'";`,
    `PRAGMA cipher_plaintext_header_size=${request.plaintextHeaderSize};`,
    `PRAGMA cipher_default_plaintext_header_size=${request.plaintextHeaderSize};`,
    `ATTACH DATABASE ${sqlQuote(request.destinationPath)} AS plaintext KEY '';`,
    `SELECT sqlcipher_export('plaintext');`,
    'DETACH DATABASE plaintext;',
    '',
  ].join('\n');
}

/**
 * Exporter that pipes the export script into the sqlcipher shell
 */
export function sqlcipherExporter(binary: string = 'sqlcipher'): StoreExporter {
  return (request) => {
    const result = spawnSync(binary, [request.sourcePath], {
      input: buildExportScript(request),
      encoding: 'utf8',
    });

    if (result.error) {
      return { status: null, stderr: result.error.message };
    }
    return { status: result.status, stderr: result.stderr };
  };
}

/**
 * A plaintext copy of the store on disk
 */
export interface PlaintextStore {
  path: string;
  /** Delete the copy; safe to call more than once */
  dispose(): void;
}

export interface DecryptStoreOptions {
  exporter?: StoreExporter;
  tempDir?: string;
}

/**
 * Fresh directory for one plaintext copy, unique to this call and readable
 * only by the current user
 */
export function allocatePlaintextDirectory(tempDir: string = tmpdir()): string {
  return mkdtempSync(join(tempDir, 'archive-'));
}

/**
 * Export a plaintext copy of the encrypted store.
 * @throws DecryptionError if the engine fails or produces no output
 */
export function decryptStore(
  sourcePath: string,
  storeKey: StoreKey,
  options: DecryptStoreOptions = {}
): PlaintextStore {
  const exporter = options.exporter ?? sqlcipherExporter();
  const directory = allocatePlaintextDirectory(options.tempDir);
  const destinationPath = join(directory, PLAINTEXT_FILE_NAME);
  const removeCopy = () => rmSync(directory, { recursive: true, force: true });

  const result = exporter({
    sourcePath,
    destinationPath,
    hexKey: storeKeyToHex(storeKey),
    plaintextHeaderSize: PLAINTEXT_HEADER_SIZE,
  });

  if (result.status !== 0) {
    removeCopy();
    throw new DecryptionError(
      `Store export failed (status ${result.status ?? 'killed'}): ${result.stderr.trim()}`
    );
  }

  if (!existsSync(destinationPath) || statSync(destinationPath).size === 0) {
    removeCopy();
    throw new DecryptionError('Store export produced empty output. Decryption may have failed.');
  }

  return {
    path: destinationPath,
    dispose: removeCopy,
  };
}
