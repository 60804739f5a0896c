import * as fs from 'fs';
import * as path from 'path';

/**
 * Configuration for file transport
 */
export interface FileTransportConfig {
  /** Base directory for logs (default: 'logs') */
  logDir: string;
  /** Service name used as the file stem */
  service: string;
  /** Max file size in bytes before rotation (default: 5MB) */
  maxSize: number;
  /** Number of rotated files to keep (default: 5) */
  maxFiles: number;
  /** Write errors to separate .error.log file */
  separateErrorLog: boolean;
}

export const DEFAULT_FILE_CONFIG: FileTransportConfig = {
  logDir: 'logs',
  service: 'klinecheck',
  maxSize: 5_000_000,
  maxFiles: 5,
  separateErrorLog: true,
};

type LogFileType = 'main' | 'error';

interface OpenLogFile {
  stream: fs.WriteStream;
  size: number;
}

/**
 * File transport writing JSON lines to disk with size-based rotation
 *
 * - {service}.log, rotated to {service}.log.1 ... {service}.log.{maxFiles}
 * - {service}.error.log for ERROR and FATAL entries
 */
export class FileTransport {
  private readonly config: FileTransportConfig;
  private readonly files = new Map<LogFileType, OpenLogFile>();

  constructor(config: Partial<FileTransportConfig> = {}) {
    this.config = { ...DEFAULT_FILE_CONFIG, ...config };
    fs.mkdirSync(this.config.logDir, { recursive: true });
  }

  /**
   * Path of the live log file for a type
   */
  getLogFilePath(type: LogFileType): string {
    const suffix = type === 'main' ? '.log' : `.${type}.log`;
    return path.join(this.config.logDir, `${this.config.service}${suffix}`);
  }

  /**
   * Write a log entry to the main log file (and the error log when applicable)
   */
  write(entry: Record<string, unknown>): void {
    this.append('main', entry);

    const level = entry.level;
    if (this.config.separateErrorLog && (level === 'ERROR' || level === 'FATAL')) {
      this.append('error', entry);
    }
  }

  private append(type: LogFileType, entry: Record<string, unknown>): void {
    const line = JSON.stringify(entry) + '\n';
    const file = this.open(type);
    file.stream.write(line);
    file.size += Buffer.byteLength(line, 'utf8');
  }

  private open(type: LogFileType): OpenLogFile {
    const current = this.files.get(type);
    if (current && current.size < this.config.maxSize) {
      return current;
    }

    if (current) {
      current.stream.end();
      this.files.delete(type);
      this.rotateFiles(type);
    }

    const filePath = this.getLogFilePath(type);
    const size = fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
    const file: OpenLogFile = {
      stream: fs.createWriteStream(filePath, { flags: 'a' }),
      size,
    };
    this.files.set(type, file);
    return file;
  }

  /**
   * Shift {file}.1..{file}.{n-1} up by one and move the live file to .1
   */
  private rotateFiles(type: LogFileType): void {
    const basePath = this.getLogFilePath(type);

    const oldestPath = `${basePath}.${this.config.maxFiles}`;
    if (fs.existsSync(oldestPath)) {
      fs.unlinkSync(oldestPath);
    }

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${basePath}.${i}`;
      if (fs.existsSync(oldPath)) {
        fs.renameSync(oldPath, `${basePath}.${i + 1}`);
      }
    }

    if (fs.existsSync(basePath)) {
      fs.renameSync(basePath, `${basePath}.1`);
    }
  }

  /**
   * Wait until everything written so far has reached the kernel
   */
  async flush(): Promise<void> {
    await Promise.all(
      [...this.files.values()].map(
        ({ stream }) =>
          new Promise<void>((resolve) => {
            if (stream.writableLength === 0) {
              resolve();
              return;
            }
            // callback fires once every queued chunk ahead of it is written
            stream.write('', () => resolve());
          })
      )
    );
  }

  /**
   * Close all open streams
   */
  async close(): Promise<void> {
    const open = [...this.files.values()];
    this.files.clear();
    await Promise.all(
      open.map(({ stream }) => new Promise<void>((resolve) => stream.end(() => resolve())))
    );
  }
}
