/**
 * Card Handlers - HTTP surface of the scratch card store
 */
import { Router, type Request, type Response } from 'express';
import type { ActivationError } from '../../errors.js';
import type { ScratchCardStore } from '../../stores/scratch-card.js';
import type { CardSnapshot } from '../../types.js';
import type { ActivationFailureResponse, CardStatusResponse } from '../types.js';

export function formatSSEEvent(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function toCardStatus(snapshot: CardSnapshot): CardStatusResponse {
  return {
    card: snapshot.card,
    error: snapshot.error,
    loading: snapshot.loading,
    scratching: snapshot.scratching
  };
}

export function activationFailureStatus(error: ActivationError): number {
  switch (error.kind) {
    case 'missing_code':
      return 400;
    case 'already_activated':
      return 409;
    case 'transport':
      return 502;
    case 'invalid_response':
    case 'threshold_not_met':
      return 422;
  }
}

function requestTag(req: Request): string {
  return req.metadata?.request_id ?? '-';
}

function openEventStream(res: Response): { send: (event: string, data: unknown) => void } {
  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive'
  });

  return {
    send: (event: string, data: unknown) => {
      if (!res.writable) return;
      res.write(formatSSEEvent(event, data));
    }
  };
}

export function createCardRouter(store: ScratchCardStore): Router {
  const router = Router();

  router.get('/card', (_req, res) => {
    res.json(toCardStatus(store.snapshot()));
  });

  router.get('/history', (_req, res) => {
    res.json({ entries: store.history() });
  });

  router.post('/scratch', (req, res) => {
    const tag = requestTag(req);
    const handle = store.scratch();
    handle.done
      .then(outcome => console.log(`[Server] ${tag} Scratch finished: ${outcome.status}`))
      .catch(err => console.error(`[Server] ${tag} Scratch error:`, err));
    res.status(202).json({ status: 'scratching' });
  });

  router.delete('/scratch', (_req, res) => {
    res.json({ cancelled: store.cancelScratch() });
  });

  router.post('/activate', async (req, res) => {
    // Client disconnecting mid-verification discards the result
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    const outcome = await store.activate(controller.signal);
    console.log(`[Server] ${requestTag(req)} Activation ${outcome.status}`);
    if (res.headersSent || !res.writable) return;

    switch (outcome.status) {
      case 'activated':
        res.json({ card: outcome.card });
        return;
      case 'failed': {
        const body: ActivationFailureResponse = { error: outcome.error.message, kind: outcome.error.kind };
        res.status(activationFailureStatus(outcome.error)).json(body);
        return;
      }
      case 'discarded':
        res.status(409).json({ error: 'Activation result discarded', kind: 'discarded' });
        return;
    }
  });

  router.delete('/error', (_req, res) => {
    store.clearError();
    res.status(204).end();
  });

  router.get('/events', (req, res) => {
    const stream = openEventStream(res);
    stream.send('snapshot', store.snapshot());
    const unsubscribe = store.subscribe(snapshot => stream.send('snapshot', snapshot));
    req.on('close', unsubscribe);
  });

  return router;
}
