import { Request, Response, Router } from 'express';
import type { CallSnapshot } from '../calls/types';
import type { PbxClient } from '../client/pbxClient';
import { isPbxError, type PbxErrorCode } from '../errors';
import { log } from '../log';

type RequestWithId = Request & { id?: string };

const STATUS_BY_CODE: Partial<Record<PbxErrorCode, number>> = {
  not_found: 404,
  action_timeout: 504,
  action_rejected: 502,
  disconnected: 503,
};

export interface SerializedCall {
  callId: string;
  linkedId?: string;
  channel: string;
  extension: string;
  callerIdName?: string;
  callerIdNumber?: string;
  direction: CallSnapshot['direction'];
  state: CallSnapshot['state'];
  startedAt: string;
  answeredAt: string | null;
  endedAt: string | null;
  endCause: CallSnapshot['endCause'];
  causeCode?: string;
  causeText?: string;
  missed: boolean;
}

export function serializeCall(call: CallSnapshot): SerializedCall {
  return {
    callId: call.callId,
    linkedId: call.linkedId,
    channel: call.channel,
    extension: call.extension,
    callerIdName: call.callerIdName,
    callerIdNumber: call.callerIdNumber,
    direction: call.direction,
    state: call.state,
    startedAt: call.startedAt.toISOString(),
    answeredAt: call.answeredAt ? call.answeredAt.toISOString() : null,
    endedAt: call.endedAt ? call.endedAt.toISOString() : null,
    endCause: call.endCause,
    causeCode: call.causeCode,
    causeText: call.causeText,
    missed: call.missed,
  };
}

function describeFailure(error: unknown): { status: number; error: string; message?: string } {
  if (isPbxError(error)) {
    const status = STATUS_BY_CODE[error.code];
    if (status !== undefined) {
      return { status, error: error.code, message: error.message };
    }
  }
  return { status: 500, error: 'internal_server_error' };
}

export function createCallsRouter(client: PbxClient): Router {
  const router = Router();

  router.get('/status', (_req, res) => {
    res.status(200).json(client.status());
  });

  router.get('/calls', (_req, res) => {
    const calls = client
      .listActiveCalls()
      .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime())
      .map(serializeCall);
    res.status(200).json({ calls });
  });

  router.get('/calls/:callId', (req, res) => {
    const call = client.getCall(req.params.callId);
    if (!call) {
      res.status(404).json({ error: 'not_found' });
      return;
    }
    res.status(200).json({ call: serializeCall(call) });
  });

  router.post('/calls/:callId/hangup', async (req: RequestWithId, res: Response) => {
    const callId = req.params.callId;
    try {
      await client.hangup(callId);
      res.status(202).json({ ok: true });
    } catch (error) {
      const failure = describeFailure(error);
      log.warn(
        { err: error, event: 'call_hangup_failed', call_id: callId, code: failure.error, requestId: req.id },
        'hangup request failed',
      );
      res.status(failure.status).json({ error: failure.error, message: failure.message });
    }
  });

  router.get('/extensions', async (req: RequestWithId, res: Response) => {
    try {
      res.status(200).json({ extensions: await client.listExtensions() });
    } catch (error) {
      const failure = describeFailure(error);
      log.warn({ err: error, event: 'extension_list_failed', requestId: req.id }, 'extension listing failed');
      res.status(failure.status).json({ error: failure.error, message: failure.message });
    }
  });

  return router;
}
