import { z } from 'zod';
import type { CapabilitiesService } from '@ogc-explorer/core';

export const listServicesSchema = z.object({
  kind: z.enum(['WMS', 'WFS', 'WCS']).optional().describe('Filter by service type')
});

export type ListServicesParams = z.infer<typeof listServicesSchema>;

export async function listServices(params: ListServicesParams, service: CapabilitiesService) {
  const services = service.listServices(params.kind).map(entry => ({
    key: entry.key,
    label: entry.label,
    kind: entry.kind,
    group: entry.group,
    url: entry.baseUrl
  }));

  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify({ count: services.length, services }, null, 2)
      }
    ]
  };
}
