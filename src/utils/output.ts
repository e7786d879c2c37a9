import fs from 'fs';
import path from 'path';
import { ArtifactKind, WriteError } from '../types';
import { timestampForFilename } from './paths';

export interface ArtifactDirs {
  mediaDir: string;
  reportDir: string;
  logDir: string;
}

export interface ArtifactRequest {
  kind: ArtifactKind;
  serial: string | null;
  extension: string;
}

export interface OutputSink {
  /** Directory an artifact of this kind lands in. */
  directoryFor(kind: ArtifactKind): string;
  /** Returns an unused path in a writable directory without creating the file. */
  reserve(request: ArtifactRequest): string;
  writeBytes(request: ArtifactRequest, data: Buffer): string;
  writeText(request: ArtifactRequest, text: string): string;
}

function isErrnoError(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

// screenshot-emulator-5554-20240131-235959.png, then ...-1.png, ...-2.png
export function artifactFileName(request: ArtifactRequest, when: Date, counter = 0): string {
  const serial = (request.serial ?? 'nodevice').replace(/[^A-Za-z0-9._-]/g, '_');
  const suffix = counter > 0 ? `-${counter}` : '';
  return `${request.kind}-${serial}-${timestampForFilename(when)}${suffix}.${request.extension}`;
}

export function createOutputSink(dirs: ArtifactDirs, clock: () => Date = () => new Date()): OutputSink {
  const directoryFor = (kind: ArtifactKind): string => {
    switch (kind) {
      case 'screenshot':
      case 'screenrecord':
        return dirs.mediaDir;
      case 'report':
        return dirs.reportDir;
      case 'logcat':
        return dirs.logDir;
      default: {
        const exhaust: never = kind;
        throw new Error(`Unknown artifact kind: ${String(exhaust)}`);
      }
    }
  };

  const ensureWritableDir = (dir: string): void => {
    try {
      fs.mkdirSync(dir, { recursive: true });
      fs.accessSync(dir, fs.constants.W_OK);
    } catch (error) {
      throw new WriteError(dir, asError(error));
    }
  };

  const reserve = (request: ArtifactRequest): string => {
    const dir = directoryFor(request.kind);
    ensureWritableDir(dir);
    const when = clock();
    let counter = 0;
    let candidate = path.join(dir, artifactFileName(request, when, counter));
    while (fs.existsSync(candidate)) {
      counter++;
      candidate = path.join(dir, artifactFileName(request, when, counter));
    }
    return candidate;
  };

  const write = (request: ArtifactRequest, data: Buffer | string): string => {
    const dir = directoryFor(request.kind);
    ensureWritableDir(dir);
    const when = clock();

    // 'wx' fails on an existing file, so a name is never reused
    for (let counter = 0; ; counter++) {
      const target = path.join(dir, artifactFileName(request, when, counter));
      try {
        fs.writeFileSync(target, data, { flag: 'wx' });
        return target;
      } catch (error) {
        if (isErrnoError(error, 'EEXIST')) {
          continue;
        }
        throw new WriteError(target, asError(error));
      }
    }
  };

  return {
    directoryFor,
    reserve,
    writeBytes: (request, data) => write(request, data),
    writeText: (request, text) => write(request, text),
  };
}
