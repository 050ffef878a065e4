import { performance } from 'node:perf_hooks';
import type { ByteTransport } from '../http.js';
import { CapabilitiesUnavailableError, MalformedDocumentError, OgcError } from '../errors.js';
import { moduleLogger } from '../logger.js';
import type { ParsedCapabilities, ServiceDescriptor, ServiceKind } from '../types.js';
import { buildEndpointUrl, capabilitiesOverrides, DEFAULT_MAX_URL_LENGTH } from './endpoint.js';
import { parseWcsCapabilities } from './parse-wcs.js';
import { parseWfsCapabilities } from './parse-wfs.js';
import { parseWmsCapabilities } from './parse-wms.js';

const log = moduleLogger('negotiate');

export const LAST_ERROR_MAX_LENGTH = 220;

/** Most modern first; `''` sends no version parameter at all. */
export const VERSION_CANDIDATES: Readonly<Record<ServiceKind, readonly string[]>> = {
  WMS: ['1.3.0', '1.1.1', ''],
  WFS: ['2.0.0', '1.1.0', '1.0.0', ''],
  WCS: ['2.0.1', '2.0.0', '1.0.0', '']
};

export type DialectParser = (bytes: Uint8Array) => ParsedCapabilities;

export const DIALECT_PARSERS: Readonly<Record<ServiceKind, DialectParser>> = {
  WMS: parseWmsCapabilities,
  WFS: parseWfsCapabilities,
  WCS: parseWcsCapabilities
};

export type AttemptOutcome =
  | {
      ok: true;
      requestedVersion: string;
      capabilitiesUrl: string;
      parsed: ParsedCapabilities;
      durationMs: number;
    }
  | {
      ok: false;
      requestedVersion: string;
      capabilitiesUrl: string;
      error: OgcError;
    };

export type NegotiatedCapabilities = Extract<AttemptOutcome, { ok: true }>;

export interface VersionNegotiatorOptions {
  maxUrlLength?: number;
  candidates?: Partial<Record<ServiceKind, readonly string[]>>;
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

export class VersionNegotiator {
  private readonly maxUrlLength: number;
  private readonly candidates: Record<ServiceKind, readonly string[]>;

  constructor(
    private readonly transport: ByteTransport,
    options: VersionNegotiatorOptions = {}
  ) {
    this.maxUrlLength = options.maxUrlLength ?? DEFAULT_MAX_URL_LENGTH;
    this.candidates = { ...VERSION_CANDIDATES, ...options.candidates };
  }

  /**
   * One fetch-and-parse try. Pipeline errors come back as an outcome;
   * `InvalidEndpointError` is thrown because no other version can fix it.
   */
  async attempt(descriptor: ServiceDescriptor, version: string): Promise<AttemptOutcome> {
    const capabilitiesUrl = buildEndpointUrl(
      descriptor.baseUrl,
      capabilitiesOverrides(descriptor.kind, version),
      this.maxUrlLength
    );
    const startedAt = performance.now();

    try {
      const bytes = await this.transport.getBytes(capabilitiesUrl);
      const parsed = DIALECT_PARSERS[descriptor.kind](bytes);
      return {
        ok: true,
        requestedVersion: version,
        capabilitiesUrl,
        parsed,
        durationMs: Math.round(performance.now() - startedAt)
      };
    } catch (error) {
      if (error instanceof OgcError) {
        return { ok: false, requestedVersion: version, capabilitiesUrl, error };
      }
      if (error instanceof Error) {
        // fast-xml-parser can still throw plain errors on odd input
        return {
          ok: false,
          requestedVersion: version,
          capabilitiesUrl,
          error: new MalformedDocumentError(error.message)
        };
      }
      throw error;
    }
  }

  async negotiate(descriptor: ServiceDescriptor): Promise<NegotiatedCapabilities> {
    let lastFailure: Extract<AttemptOutcome, { ok: false }> | undefined;

    for (const version of this.candidates[descriptor.kind]) {
      const outcome = await this.attempt(descriptor, version);
      if (outcome.ok) {
        log.debug(
          { service: descriptor.key, version: version || 'unspecified', items: outcome.parsed.items.length },
          'capabilities negotiated'
        );
        return outcome;
      }
      log.debug(
        { service: descriptor.key, version: version || 'unspecified', code: outcome.error.code, err: outcome.error.message },
        'version candidate failed'
      );
      lastFailure = outcome;
    }

    const reason = lastFailure ? lastFailure.error.message : 'no version candidates configured';
    throw new CapabilitiesUnavailableError(
      `${descriptor.kind} capabilities could not be loaded: ${truncate(reason, LAST_ERROR_MAX_LENGTH)}`,
      lastFailure?.error
    );
  }
}
