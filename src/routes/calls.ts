// API Routes: /api/calls/originate, /api/calls/:callId/hangup,
// /api/calls/:callId/status and /api/pbx/extensions.
// Thin pass-through to the VitalPBX call-control API.

import { z } from 'zod';
import { logger } from '@/logger';
import type { VitalPbxClient } from '@/lib/api/vitalpbx';

const originateSchema = z.object({
  extension: z.string().trim().regex(/^\d+$/, 'extension must be numeric'),
  destination: z.string().trim().min(1, 'destination is required'),
  callerId: z.string().trim().min(1).optional(),
});

async function readJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    return null;
  }
}

export function createCallRoutes(pbx: Pick<VitalPbxClient, 'originate' | 'hangup' | 'getCallStatus' | 'getExtensions'>) {
  async function originate(request: Request): Promise<Response> {
    const parsed = originateSchema.safeParse(await readJson(request));
    if (!parsed.success) {
      return Response.json(
        { error: 'Invalid request', details: parsed.error.issues.map((issue) => issue.message) },
        { status: 400 }
      );
    }

    const { extension, destination, callerId } = parsed.data;
    const result = await pbx.originate(extension, destination, callerId);
    if (!result.success) {
      logger.warn({ extension, destination, error: result.error }, 'Click-to-call failed');
      return Response.json({ success: false, error: result.error }, { status: 502 });
    }
    return Response.json(result);
  }

  async function hangup(callId: string): Promise<Response> {
    if (!callId) {
      return Response.json({ error: 'callId is required' }, { status: 400 });
    }

    const result = await pbx.hangup(callId);
    if (!result.success) {
      logger.warn({ callId, error: result.error }, 'Remote hangup failed');
      return Response.json(result, { status: 502 });
    }
    return Response.json(result);
  }

  async function status(callId: string): Promise<Response> {
    const result = await pbx.getCallStatus(callId);
    return Response.json(result, { status: result.success ? 200 : 502 });
  }

  async function extensions(): Promise<Response> {
    const result = await pbx.getExtensions();
    return Response.json(result, { status: result.success ? 200 : 502 });
  }

  return { originate, hangup, status, extensions };
}
