/**
 * Lazy loaders for the CommonJS persistence helpers used by the context store
 * and the marker writer. Both are only loaded once a write actually happens.
 */
import type { lock } from 'proper-lockfile';

type Lock = typeof lock;
type WriteFileAtomic = (filename: string, data: string, options: { encoding: BufferEncoding }) => Promise<void>;

let _lock: Lock | undefined;
let _writeFileAtomic: WriteFileAtomic | undefined;

export async function getLock(): Promise<Lock> {
  if (!_lock) {
    const mod = await import('proper-lockfile');
    _lock = mod.default.lock;
  }
  return _lock;
}

export async function getWriteFileAtomic(): Promise<WriteFileAtomic> {
  if (!_writeFileAtomic) {
    const mod = await import('write-file-atomic');
    _writeFileAtomic = mod.default;
  }
  return _writeFileAtomic;
}

export async function writeFileAtomically(filePath: string, content: string): Promise<void> {
  const writeFileAtomic = await getWriteFileAtomic();
  await writeFileAtomic(filePath, content, { encoding: 'utf-8' });
}
