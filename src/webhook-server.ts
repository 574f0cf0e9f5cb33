import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { ReviewSubmittedEventSchema } from './schemas.js';
import { TaskQueue } from './task-queue.js';
import type { Feedback, TaskOutcome } from './types.js';

const MAX_BODY_BYTES = 5 * 1024 * 1024;

export interface WebhookServerOptions {
  port: number;
  host?: string;
  queue: TaskQueue;
  iterate: (feedback: Feedback) => Promise<TaskOutcome>;
  logger?: Logger;
}

/**
 * Extract feedback from a review event, or null when the event is not a
 * "changes requested" review submission
 */
export function parseReviewEvent(payload: unknown): Feedback | null {
  const result = ReviewSubmittedEventSchema.safeParse(payload);
  if (!result.success) {
    return null;
  }
  return {
    branchName: result.data.pull_request.head.ref,
    reviewBody: result.data.review.body ?? '',
  };
}

class BodyTooLargeError extends Error {}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new BodyTooLargeError('Payload too large');
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function sendJson(res: ServerResponse, status: number, body: Record<string, unknown>): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Receives GitHub review webhooks. Feedback iterations are queued on the
 * single task worker and the request is answered right away.
 */
export class WebhookServer {
  private server: Server | null = null;
  private logger: Logger;

  constructor(private readonly options: WebhookServerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Start listening; resolves with the bound port
   */
  async start(): Promise<number> {
    const server = createServer((req, res) => {
      this.handle(req, res).catch((error) => {
        this.logger.error(`Webhook handler failed: ${errorMessage(error)}`);
        if (!res.headersSent) {
          sendJson(res, 500, { status: 'error', error: 'Internal error' });
        }
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host ?? '0.0.0.0', () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : this.options.port;
    this.logger.info(`🪝 Webhook listener on port ${port}`);
    return port;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const path = (req.url ?? '/').split('?')[0];

    if (req.method === 'GET' && path === '/health') {
      sendJson(res, 200, { status: 'ok', pending: this.options.queue.pending(), active: this.options.queue.active() });
      return;
    }

    if (req.method !== 'POST' || path !== '/webhook') {
      sendJson(res, 404, { status: 'error', error: 'Not found' });
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(await readBody(req));
    } catch (error) {
      if (error instanceof BodyTooLargeError) {
        sendJson(res, 413, { status: 'error', error: error.message });
      } else {
        sendJson(res, 400, { status: 'error', error: 'Invalid JSON' });
      }
      return;
    }

    const feedback = parseReviewEvent(payload);
    if (!feedback) {
      sendJson(res, 200, { status: 'ignored' });
      return;
    }

    this.logger.info(`💬 Feedback received on ${feedback.branchName}`);
    this.options.queue
      .enqueue(`feedback:${feedback.branchName}`, () => this.options.iterate(feedback))
      .then((outcome) => {
        if (outcome.status === 'aborted') {
          this.logger.warn(`Feedback iteration on ${feedback.branchName} aborted: ${outcome.reason}`);
        }
      })
      .catch((error) => {
        this.logger.error(`Feedback iteration on ${feedback.branchName} failed: ${errorMessage(error)}`);
      });

    sendJson(res, 202, { status: 'queued', branch: feedback.branchName });
  }
}
