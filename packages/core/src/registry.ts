import { readFileSync } from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { DEFAULT_MAX_URL_LENGTH } from './ogc/endpoint.js';
import { moduleLogger } from './logger.js';
import type { RegisteredService, ServiceKind } from './types.js';

const log = moduleLogger('registry');

export interface ServiceRegistry {
  get(key: string): RegisteredService | undefined;
  list(kind?: ServiceKind): RegisteredService[];
}

export class InMemoryServiceRegistry implements ServiceRegistry {
  private services: Map<string, RegisteredService>;

  constructor(services: Iterable<RegisteredService> = []) {
    this.services = new Map();
    for (const service of services) {
      this.services.set(service.key, service);
    }
  }

  get(key: string): RegisteredService | undefined {
    return this.services.get(key);
  }

  /** Sorted by group, then label. */
  list(kind?: ServiceKind): RegisteredService[] {
    return [...this.services.values()]
      .filter(service => !kind || service.kind === kind)
      .sort((a, b) =>
        (a.group ?? '').localeCompare(b.group ?? '') || a.label.localeCompare(b.label)
      );
  }
}

export function serviceEntrySchema(maxUrlLength = DEFAULT_MAX_URL_LENGTH) {
  return z.object({
    label: z.string().min(1),
    kind: z.string().transform(value => value.toUpperCase()).pipe(z.enum(['WMS', 'WFS', 'WCS'])),
    url: z.string()
      .max(maxUrlLength)
      .url()
      .refine(value => value.startsWith('https://'), 'must be an https:// URL'),
    group: z.string().min(1).optional()
  });
}

const registryFileSchema = z.object({
  services: z.record(z.string().min(1), z.unknown()).default({})
});

/**
 * Build a registry from the parsed `services:` mapping. Entries that fail
 * validation are skipped and logged.
 */
export function registryFromData(data: unknown, maxUrlLength = DEFAULT_MAX_URL_LENGTH): InMemoryServiceRegistry {
  const file = registryFileSchema.parse(data ?? {});
  const entrySchema = serviceEntrySchema(maxUrlLength);
  const services: RegisteredService[] = [];

  for (const [key, raw] of Object.entries(file.services)) {
    const entry = entrySchema.safeParse(raw);
    if (!entry.success) {
      log.warn({ service: key, issues: entry.error.issues.map(issue => issue.message) }, 'skipping invalid service entry');
      continue;
    }
    services.push({
      key,
      kind: entry.data.kind,
      baseUrl: entry.data.url,
      label: entry.data.label,
      ...(entry.data.group ? { group: entry.data.group } : {})
    });
  }

  return new InMemoryServiceRegistry(services);
}

export function loadServiceRegistryYaml(filePath: string, maxUrlLength = DEFAULT_MAX_URL_LENGTH): InMemoryServiceRegistry {
  const content = readFileSync(filePath, 'utf-8');
  const registry = registryFromData(parse(content), maxUrlLength);
  log.info({ file: filePath, services: registry.list().length }, 'service registry loaded');
  return registry;
}
