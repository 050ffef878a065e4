import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { ByteTransport } from '../src/http.js';
import type { PipelineConfig } from '../src/config.js';

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function fixture(name: string): Uint8Array {
  return readFileSync(fixturePath(name));
}

export function xmlBytes(text: string): Uint8Array {
  return Buffer.from(text, 'utf-8');
}

export function testConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    connectTimeoutMs: 1000,
    readTimeoutMs: 1000,
    retryCount: 0,
    retryBackoffFactor: 0,
    maxRetryAfterMs: 0,
    maxResponseBytes: 1024 * 1024,
    maxUrlLength: 400,
    cacheTtlSeconds: 60,
    cacheCapacity: 8,
    userAgent: 'test-agent/1.0',
    ...overrides
  };
}

type Responder = (url: string) => Uint8Array | Error;

/** Records every requested URL and answers from a responder function. */
export class FakeTransport implements ByteTransport {
  readonly calls: string[] = [];

  constructor(public respond: Responder) {}

  async getBytes(url: string): Promise<Uint8Array> {
    this.calls.push(url);
    const answer = this.respond(url);
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  }
}
