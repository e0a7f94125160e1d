import { z } from 'zod';
import { defineTool } from './tool';

/**
 * Tool reporting the current date and time as an ISO-8601 string
 */
export function createDatetimeTool(now: () => Date = () => new Date()) {
  return defineTool({
    name: 'get_datetime_now',
    description: 'Get the current date and time (ISO-8601, UTC).',
    schema: z.object({}),
    call: () => now().toISOString(),
  });
}

export const getDatetimeNow = createDatetimeTool();
