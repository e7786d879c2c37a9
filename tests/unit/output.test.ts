import fs from 'fs';
import os from 'os';
import path from 'path';
import { artifactFileName, createOutputSink } from '../../src/utils/output';
import { WriteError } from '../../src/types';
import { mockScreenshotData } from '../mocks/workbench.mock';

describe('Output Sink', () => {
  const when = new Date(2024, 0, 31, 23, 59, 59);
  const clock = () => when;
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'workbench-output-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function sinkIn(base: string) {
    return createOutputSink(
      {
        mediaDir: path.join(base, 'media'),
        reportDir: path.join(base, 'reports'),
        logDir: path.join(base, 'logs'),
      },
      clock
    );
  }

  describe('artifactFileName', () => {
    it('should combine kind, serial and timestamp', () => {
      expect(artifactFileName({ kind: 'screenshot', serial: 'emulator-5554', extension: 'png' }, when)).toBe(
        'screenshot-emulator-5554-20240131-235959.png'
      );
    });

    it('should append a counter and sanitize the serial', () => {
      expect(artifactFileName({ kind: 'report', serial: '192.168.1.5:5555', extension: 'txt' }, when, 2)).toBe(
        'report-192.168.1.5_5555-20240131-235959-2.txt'
      );
      expect(artifactFileName({ kind: 'logcat', serial: null, extension: 'txt' }, when)).toBe(
        'logcat-nodevice-20240131-235959.txt'
      );
    });
  });

  describe('writeBytes', () => {
    it('should create the directory and write exactly one non-empty file', () => {
      const sink = sinkIn(root);

      const written = sink.writeBytes({ kind: 'screenshot', serial: 'emulator-5554', extension: 'png' }, mockScreenshotData);

      expect(written).toBe(path.join(root, 'media', 'screenshot-emulator-5554-20240131-235959.png'));
      expect(fs.readdirSync(path.join(root, 'media'))).toEqual(['screenshot-emulator-5554-20240131-235959.png']);
      expect(fs.readFileSync(written).equals(mockScreenshotData)).toBe(true);
    });

    it('should never overwrite an artifact written in the same second', () => {
      const sink = sinkIn(root);
      const request = { kind: 'screenshot', serial: 'emu', extension: 'png' } as const;

      const first = sink.writeBytes(request, mockScreenshotData);
      const second = sink.writeBytes(request, Buffer.from('second'));

      expect(path.basename(first)).toBe('screenshot-emu-20240131-235959.png');
      expect(path.basename(second)).toBe('screenshot-emu-20240131-235959-1.png');
      expect(fs.readFileSync(first).equals(mockScreenshotData)).toBe(true);
      expect(fs.readFileSync(second, 'utf-8')).toBe('second');
    });

    it('should raise WriteError when the directory cannot be created', () => {
      const blocker = path.join(root, 'blocker');
      fs.writeFileSync(blocker, 'not a directory');
      const sink = sinkIn(blocker);

      expect(() => sink.writeBytes({ kind: 'screenshot', serial: 'emu', extension: 'png' }, mockScreenshotData)).toThrow(
        WriteError
      );
    });
  });

  describe('writeText', () => {
    it('should route reports and logcat dumps to their own directories', () => {
      const sink = sinkIn(root);

      const report = sink.writeText({ kind: 'report', serial: 'emu', extension: 'txt' }, 'serial: emu\n');
      const dump = sink.writeText({ kind: 'logcat', serial: 'emu', extension: 'txt' }, 'I/Tag: hello\n');

      expect(path.dirname(report)).toBe(path.join(root, 'reports'));
      expect(path.dirname(dump)).toBe(path.join(root, 'logs'));
      expect(fs.readFileSync(report, 'utf-8')).toBe('serial: emu\n');
    });
  });

  describe('reserve', () => {
    it('should skip names that already exist without creating the file', () => {
      const sink = sinkIn(root);
      const request = { kind: 'screenrecord', serial: 'emu', extension: 'mp4' } as const;
      fs.mkdirSync(path.join(root, 'media'));
      fs.writeFileSync(path.join(root, 'media', 'screenrecord-emu-20240131-235959.mp4'), 'old');

      const reserved = sink.reserve(request);

      expect(reserved).toBe(path.join(root, 'media', 'screenrecord-emu-20240131-235959-1.mp4'));
      expect(fs.existsSync(reserved)).toBe(false);
    });
  });

  describe('directoryFor', () => {
    it('should put screenshots and recordings in the media directory', () => {
      const sink = sinkIn(root);

      expect(sink.directoryFor('screenshot')).toBe(path.join(root, 'media'));
      expect(sink.directoryFor('screenrecord')).toBe(path.join(root, 'media'));
    });
  });
});
