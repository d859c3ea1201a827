// API Routes: /api/popups/stats and /api/popups/health

import { z } from 'zod';
import { logger } from '@/logger';
import type { PopupDispatcher } from '@/lib/phonebridge/popup-dispatcher';

const statsQuerySchema = z.object({
  hours: z.coerce.number().int().min(1).max(24 * 30).default(24),
});

export function createPopupRoutes(dispatcher: Pick<PopupDispatcher, 'statistics' | 'healthReport'>) {
  async function stats(request: Request): Promise<Response> {
    const { searchParams } = new URL(request.url);
    const query = statsQuerySchema.safeParse({ hours: searchParams.get('hours') ?? undefined });
    if (!query.success) {
      return Response.json(
        { error: 'Invalid query', details: query.error.issues.map((issue) => issue.message) },
        { status: 400 }
      );
    }

    try {
      return Response.json(await dispatcher.statistics(query.data.hours));
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Popup statistics failed');
      return Response.json({ error: 'Failed to load popup statistics' }, { status: 500 });
    }
  }

  async function health(): Promise<Response> {
    try {
      return Response.json(await dispatcher.healthReport());
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Popup health report failed');
      return Response.json({ error: 'Failed to build health report' }, { status: 500 });
    }
  }

  return { stats, health };
}
