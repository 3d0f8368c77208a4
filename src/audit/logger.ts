import { appendFile, mkdir, rename, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';

export interface AuditEvent {
  action: string;
  target?: string;
  result: 'success' | 'error' | 'denied';
  details?: Record<string, unknown>;
}

export interface AuditSink {
  log(event: AuditEvent): Promise<void>;
}

export interface AuditLoggerOptions {
  enabled: boolean;
  filePath: string;
  maxEventBytes: number;
  maxFileBytes: number;
  maxFiles: number;
  service: string;
  serviceVersion: string;
}

export class AuditLogger implements AuditSink {
  private readonly options: AuditLoggerOptions;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: AuditLoggerOptions) {
    this.options = options;
  }

  isEnabled(): boolean {
    return this.options.enabled;
  }

  log(event: AuditEvent): Promise<void> {
    if (!this.options.enabled) {
      return Promise.resolve();
    }

    const line = this.formatLine(event);
    this.writeChain = this.writeChain
      .then(async () => {
        await mkdir(dirname(this.options.filePath), { recursive: true });
        await this.rotateIfNeeded(line);
        await appendFile(this.options.filePath, `${line}\n`, 'utf8');
      })
      .catch((error: unknown) => {
        console.error('[trigger-waitset] audit write failed:', error);
      });

    return this.flush();
  }

  flush(): Promise<void> {
    return this.writeChain;
  }

  private formatLine(event: AuditEvent): string {
    const payload = {
      timestamp: new Date().toISOString(),
      service: this.options.service,
      serviceVersion: this.options.serviceVersion,
      ...event
    };

    const line = JSON.stringify(payload);
    if (Buffer.byteLength(line, 'utf8') <= this.options.maxEventBytes) {
      return line;
    }

    return JSON.stringify({
      ...payload,
      details: {
        truncated: true,
        reason: `payload exceeds ${this.options.maxEventBytes} bytes`
      }
    });
  }

  private async rotateIfNeeded(line: string): Promise<void> {
    const { filePath, maxFiles, maxFileBytes } = this.options;
    const incomingBytes = Buffer.byteLength(`${line}\n`, 'utf8');
    if ((await fileSize(filePath)) + incomingBytes <= maxFileBytes) {
      return;
    }

    await rm(`${filePath}.${maxFiles}`, { force: true });
    for (let generation = maxFiles - 1; generation >= 1; generation -= 1) {
      await renameIfExists(`${filePath}.${generation}`, `${filePath}.${generation + 1}`);
    }
    await renameIfExists(filePath, `${filePath}.1`);
  }
}

async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (isMissingFileError(error)) {
      return 0;
    }

    throw error;
  }
}

async function renameIfExists(fromPath: string, toPath: string): Promise<void> {
  try {
    await rename(fromPath, toPath);
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error;
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
