/**
 * In-process stand-in for the predictor/explainer backends.
 * Listens on an ephemeral port and records every request it receives.
 */

import express from 'express';
import type { Request, Response } from 'express';
import type { Server } from 'http';

export interface RecordedRequest {
  method: string;
  path: string;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

export interface StubReply {
  status: number;
  body: string;
  delayMs?: number;
  // headers go out at once, then `body` is written in pieces of this size
  chunkSize?: number;
  chunkIntervalMs?: number;
}

export interface UpstreamStub {
  host: string;
  requests: RecordedRequest[];
  reply(handler: (request: RecordedRequest) => StubReply): void;
  close(): Promise<void>;
}

export async function startUpstreamStub(): Promise<UpstreamStub> {
  const requests: RecordedRequest[] = [];
  const timers = new Set<NodeJS.Timeout>();
  let handler: (request: RecordedRequest) => StubReply = () => ({ status: 200, body: '{}' });

  const app = express();
  app.use(express.text({ type: '*/*', limit: '10mb' }));
  app.use((req: Request, res: Response) => {
    const recorded: RecordedRequest = {
      method: req.method,
      path: req.path,
      headers: req.headers,
      body: typeof req.body === 'string' ? req.body : ''
    };
    requests.push(recorded);

    const { status, body, delayMs, chunkSize, chunkIntervalMs } = handler(recorded);
    if (chunkSize !== undefined) {
      res.status(status).type('application/json');
      res.flushHeaders();
      let offset = 0;
      const timer = setInterval(() => {
        res.write(body.slice(offset, offset + chunkSize));
        offset += chunkSize;
        if (offset >= body.length) {
          clearInterval(timer);
          timers.delete(timer);
          res.end();
        }
      }, chunkIntervalMs ?? 10);
      timers.add(timer);
      res.on('close', () => {
        clearInterval(timer);
        timers.delete(timer);
      });
      return;
    }

    const send = () => {
      res.status(status).type('application/json').send(body);
    };
    if (delayMs === undefined) {
      send();
      return;
    }
    const timer = setTimeout(() => {
      timers.delete(timer);
      send();
    }, delayMs);
    timers.add(timer);
  });

  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Upstream stub is not listening on a TCP port');
  }
  const { port } = address;

  return {
    host: `127.0.0.1:${port}`,
    requests,
    reply(next) {
      handler = next;
    },
    close() {
      for (const timer of timers) {
        clearTimeout(timer);
      }
      timers.clear();
      server.closeAllConnections();
      return new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
    }
  };
}
