import fs from 'fs';
import { FileError } from '../errors';

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function readInputFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    if (isErrnoException(err)) {
      switch (err.code) {
        case 'ENOENT':
          throw new FileError(filePath, `'${filePath}' not found.`);
        case 'EISDIR':
          throw new FileError(filePath, `'${filePath}' is a directory.`);
        case 'EACCES':
        case 'EPERM':
          throw new FileError(filePath, `Permission denied reading '${filePath}'.`);
        default:
          break;
      }
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new FileError(filePath, `Error reading '${filePath}': ${reason}`);
  }
}
