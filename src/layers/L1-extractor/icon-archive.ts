import { extract } from 'tar-stream';
import { ThemeGenError, toError, type ArchiveEntries } from '../../shared/types';

/**
 * Read a tar archive into memory, keyed by entry path.
 * Only regular files are kept; entries rejected by `wanted` are drained
 * without being buffered.
 */
export function readArchive(
  archive: Buffer,
  wanted?: (path: string) => boolean,
): Promise<ArchiveEntries> {
  return new Promise((resolve, reject) => {
    const entries: ArchiveEntries = new Map();
    const extractor = extract();

    const fail = (err: unknown): void => {
      reject(
        new ThemeGenError({
          code: 'THEMEGEN_E304',
          severity: 'high',
          message: `Cannot read icon archive: ${toError(err).message}`,
          cause: toError(err),
        }),
      );
    };

    extractor.on('entry', (header, stream, next) => {
      // A truncated archive destroys the current entry stream with the error.
      stream.on('error', fail);
      const keep = header.type === 'file' && (wanted === undefined || wanted(header.name));
      if (!keep) {
        stream.on('end', () => next());
        stream.resume();
        return;
      }

      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        entries.set(header.name, Buffer.concat(chunks));
        next();
      });
    });

    extractor.on('finish', () => resolve(entries));
    extractor.on('error', fail);

    extractor.end(archive);
  });
}
