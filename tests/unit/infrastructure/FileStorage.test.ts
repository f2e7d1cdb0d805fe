import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { FileStorage } from '../../../src/infrastructure/storage/FileStorage';

// Mock config
jest.mock('../../../src/config/index', () => jest.requireActual('../../helpers/testConfig'));

// Mock logger
jest.mock('../../../src/infrastructure/logging/Logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

function failingAfter(chunk: string): Readable {
  let sent = false;
  return new Readable({
    read() {
      if (sent) {
        this.destroy(new Error('connection reset'));
        return;
      }
      sent = true;
      this.push(Buffer.from(chunk));
    },
  });
}

describe('FileStorage', () => {
  let tmpDir: string;
  let storage: FileStorage;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'file-storage-'));
    storage = new FileStorage(tmpDir);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('getPath', () => {
    it('should resolve relative names under the base directory', () => {
      expect(storage.getPath('meeting/audio.m4a')).toBe(path.join(tmpDir, 'meeting', 'audio.m4a'));
    });

    it('should keep absolute paths', () => {
      const absolute = path.join(os.tmpdir(), 'elsewhere', 'video.mp4');
      expect(storage.getPath(absolute)).toBe(absolute);
    });
  });

  describe('save', () => {
    it('should write the stream and report the bytes written', async () => {
      const saved = await storage.save('standup.mp4', Readable.from([Buffer.from('hello')]));

      expect(saved).toEqual({ filePath: path.join(tmpDir, 'standup.mp4'), bytesWritten: 5 });
      expect(await fs.readFile(saved.filePath, 'utf-8')).toBe('hello');
    });

    it('should create missing parent directories', async () => {
      const saved = await storage.save('2024/03/standup.mp4', Readable.from([Buffer.from('abc')]));

      expect(saved.filePath).toBe(path.join(tmpDir, '2024', '03', 'standup.mp4'));
      expect(await fs.readFile(saved.filePath, 'utf-8')).toBe('abc');
    });

    it('should replace an existing file at the requested path', async () => {
      await storage.save('standup.mp4', Readable.from([Buffer.from('first')]));
      const second = await storage.save('standup.mp4', Readable.from([Buffer.from('second')]));

      expect(second).toEqual({ filePath: path.join(tmpDir, 'standup.mp4'), bytesWritten: 6 });
      expect(await fs.readdir(tmpDir)).toEqual(['standup.mp4']);
      expect(await fs.readFile(second.filePath, 'utf-8')).toBe('second');
    });

    it('should leave nothing behind when the stream fails part way', async () => {
      await expect(storage.save('standup.mp4', failingAfter('PARTIAL'))).rejects.toThrow('connection reset');

      expect(await fs.readdir(tmpDir)).toEqual([]);

      const retried = await storage.save('standup.mp4', Readable.from([Buffer.from('complete')]));

      expect(retried.filePath).toBe(path.join(tmpDir, 'standup.mp4'));
      expect(await fs.readFile(retried.filePath, 'utf-8')).toBe('complete');
      expect(await fs.readdir(tmpDir)).toEqual(['standup.mp4']);
    });

    it('should destroy the source when the target directory cannot be created', async () => {
      await fs.writeFile(path.join(tmpDir, 'blocker'), 'not a directory');
      const source = Readable.from([Buffer.from('video')]);

      await expect(storage.save('blocker/video.mp4', source)).rejects.toThrow();

      expect(source.destroyed).toBe(true);
    });

    it('should reject when the stream fails', async () => {
      const failing = new Readable({
        read() {
          this.destroy(new Error('connection reset'));
        },
      });

      await expect(storage.save('broken.mp4', failing)).rejects.toThrow('connection reset');
    });
  });
});
