import { z } from 'zod';
import { OgcError, type CapabilitiesService } from '@ogc-explorer/core';

export const getCapabilitiesSchema = z.object({
  service: z.string().min(1).describe('Service key from ogc_list_services'),
  refresh: z.boolean().optional()
    .describe('Bypass the cache and fetch the capabilities document again')
});

export type GetCapabilitiesParams = z.infer<typeof getCapabilitiesSchema>;

export async function getCapabilities(params: GetCapabilitiesParams, service: CapabilitiesService) {
  try {
    const result = await service.fetch(params.service, params.refresh ?? false);
    return {
      content: [
        {
          type: 'text' as const,
          text: JSON.stringify(result, null, 2)
        }
      ]
    };
  } catch (error) {
    if (!(error instanceof OgcError)) {
      throw error;
    }
    return {
      isError: true,
      content: [
        {
          type: 'text' as const,
          text: `${error.code}: ${error.message}`
        }
      ]
    };
  }
}
