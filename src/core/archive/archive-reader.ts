import yauzl from 'yauzl';
import type { Readable } from 'node:stream';

export interface ArchiveContents {
  /** Every file entry name in the archive, directories excluded. */
  entryNames: ReadonlySet<string>;
  /** Bytes of the requested entries that exist in the archive. */
  entries: ReadonlyMap<string, Buffer>;
}

function collectStream(stream: Readable): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    stream.on('end', () => resolve(Buffer.concat(chunks)));
    stream.on('error', reject);
  });
}

/**
 * Walk the central directory of a zip held in memory and read the entries
 * named in `wanted`. Rejects with the underlying yauzl error when the bytes
 * are not a readable zip.
 */
export function readArchive(
  bytes: Buffer,
  wanted: ReadonlySet<string>,
): Promise<ArchiveContents> {
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(
      bytes,
      { lazyEntries: true, autoClose: false },
      (err, zipfile) => {
        if (err) return reject(err);
        if (!zipfile) return reject(new Error('Failed to open zip archive'));

        const entryNames = new Set<string>();
        const entries = new Map<string, Buffer>();
        let settled = false;

        const fail = (error: Error): void => {
          if (settled) return;
          settled = true;
          zipfile.close();
          reject(error);
        };

        zipfile.on('entry', (entry: yauzl.Entry) => {
          const fileName = entry.fileName;
          if (fileName.endsWith('/')) {
            zipfile.readEntry();
            return;
          }

          entryNames.add(fileName);
          if (!wanted.has(fileName) || entries.has(fileName)) {
            zipfile.readEntry();
            return;
          }

          zipfile.openReadStream(entry, (streamErr, readStream) => {
            if (streamErr) return fail(streamErr);
            if (!readStream) return fail(new Error(`No read stream for ${fileName}`));

            collectStream(readStream)
              .then((data) => {
                entries.set(fileName, data);
                zipfile.readEntry();
              })
              .catch(fail);
          });
        });

        zipfile.on('end', () => {
          if (settled) return;
          settled = true;
          zipfile.close();
          resolve({ entryNames, entries });
        });
        zipfile.on('error', fail);

        zipfile.readEntry();
      },
    );
  });
}
