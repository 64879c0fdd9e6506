import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { z, ZodError } from 'zod';
import { SessionBusyError, StoreUnavailableError } from './errors';
import type { Logger } from './logging';
import type { AssistantRuntime } from './runtime';
import { profileBagSchema } from './session/profile';
import { formatIssues } from './tools/schema';
import { mergePaymentIntoProfile, reconcileCheckout } from './tools/reconcile';
import type { TurnResult } from './types';

const SERVICE_NAME = 'tripguard-assistant';

const BUSY_REPLY = "I'm still working on your previous message. Please wait a moment and send this again.";
const STORE_DOWN_REPLY = "I can't reach your conversation history right now. Please try again in a few minutes.";

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

const chatRequestSchema = z.object({
  session_id: z.string().trim().min(1),
  message_text: z.string().trim().min(1),
  channel: z.string().trim().min(1).optional(),
  partner_id: z.string().trim().min(1).optional(),
  profile_patch: profileBagSchema.optional(),
});

const policyIndexRequestSchema = z.object({
  refresh: z.boolean().optional(),
});

const paymentWebhookSchema = z.object({
  session_id: z.string().trim().min(1),
  transaction_key: z.string().trim().min(1),
  checkout_ref: z.string().trim().min(1),
  checkout_url: z.string().url().optional(),
  status: z.string().trim().min(1),
  payment_status: z.string().trim().min(1).optional(),
});

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { 'content-type': 'application/json; charset=utf-8' });
  res.end(JSON.stringify(body, null, 2));
}

async function readJsonBody(req: IncomingMessage, options: { allowEmpty?: boolean } = {}): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString('utf8').trim();
  if (!raw) {
    if (options.allowEmpty) {
      return {};
    }
    throw new BadRequestError('Request body is empty');
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new BadRequestError('Request body is not valid JSON');
  }
}

async function readBody<T>(req: IncomingMessage, schema: z.ZodType<T, z.ZodTypeDef, unknown>, allowEmpty = false): Promise<T> {
  const result = schema.safeParse(await readJsonBody(req, { allowEmpty }));
  if (!result.success) {
    throw new BadRequestError(`Invalid payload: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function toChatResponse(result: TurnResult): Record<string, unknown> {
  return {
    request_id: result.requestId,
    session_id: result.sessionId,
    reply_text: result.replyText,
    outcome: result.outcome,
    ...(result.stallReason ? { stall_reason: result.stallReason } : {}),
    tool_runs: result.toolRuns.map((run) => ({
      name: run.name,
      input: run.input,
      result_status: run.resultStatus,
      ...(run.errorKind ? { error_kind: run.errorKind } : {}),
      ...(run.cached ? { cached: true } : {}),
    })),
  };
}

function sendFailure(res: ServerResponse, logger: Logger, event: string, error: unknown): void {
  if (error instanceof BadRequestError || error instanceof ZodError) {
    logger.warn(event, { error });
    sendJson(res, 400, { error: error.message });
    return;
  }
  if (error instanceof SessionBusyError) {
    logger.warn(event, { error });
    sendJson(res, 409, { error: BUSY_REPLY });
    return;
  }
  if (error instanceof StoreUnavailableError) {
    logger.error(event, { error, operation: error.operation });
    sendJson(res, 503, { error: STORE_DOWN_REPLY });
    return;
  }
  logger.error(event, { error });
  sendJson(res, 500, { error: 'Internal server error' });
}

type RouteHandler = (req: IncomingMessage, res: ServerResponse, logger: Logger) => Promise<void>;

interface Route {
  method: 'GET' | 'POST';
  event: string;
  handle: RouteHandler;
}

export function createAssistantHttpServer(runtime: AssistantRuntime, logger: Logger): Server {
  const { orchestrator, registry, reasoning, services } = runtime;

  const routes: Record<string, Route> = {
    '/health': {
      method: 'GET',
      event: 'http.health.error',
      handle: async (_req, res) => {
        let sessionStore: { ok: boolean; detail?: string };
        try {
          await services.sessions.ping();
          sessionStore = { ok: true };
        } catch (error) {
          sessionStore = { ok: false, detail: error instanceof Error ? error.message : String(error) };
        }

        let readiness: { ok: boolean; detail: string };
        try {
          readiness = await reasoning.readiness();
        } catch (error) {
          readiness = { ok: false, detail: error instanceof Error ? error.message : String(error) };
        }

        const ok = sessionStore.ok && readiness.ok;
        sendJson(res, ok ? 200 : 503, {
          ok,
          service: SERVICE_NAME,
          checks: { sessionStore, reasoning: readiness },
        });
      },
    },

    '/chat': {
      method: 'POST',
      event: 'http.chat.error',
      handle: async (req, res, requestLogger) => {
        const body = await readBody(req, chatRequestSchema);
        requestLogger.info('http.chat.received', {
          sessionId: body.session_id,
          channel: body.channel,
          hasProfilePatch: body.profile_patch !== undefined,
        });

        const result = await orchestrator.handleMessage({
          sessionId: body.session_id,
          text: body.message_text,
          channel: body.channel,
          partnerId: body.partner_id,
          profilePatch: body.profile_patch,
        });
        sendJson(res, 200, toChatResponse(result));
      },
    },

    '/tools/list': {
      method: 'GET',
      event: 'http.tools.list.error',
      handle: async (_req, res) => {
        sendJson(res, 200, { tools: registry.describe() });
      },
    },

    '/admin/policy-index': {
      method: 'POST',
      event: 'http.policy_index.error',
      handle: async (req, res, requestLogger) => {
        const body = await readBody(req, policyIndexRequestSchema, true);
        requestLogger.info('http.policy_index.queued', { refresh: body.refresh ?? false });

        setImmediate(() => {
          try {
            const result = services.policyIndex.rebuild();
            requestLogger.info('policy_index.rebuilt', { clausesIndexed: result.clausesIndexed });
          } catch (error) {
            requestLogger.error('policy_index.rebuild_failed', { error });
          }
        });
        sendJson(res, 202, { status: 'queued' });
      },
    },

    '/webhooks/payments': {
      method: 'POST',
      event: 'http.webhooks.payments.error',
      handle: async (req, res, requestLogger) => {
        const body = await readBody(req, paymentWebhookSchema);
        const record = await reconcileCheckout(services.ledger, {
          sessionId: body.session_id,
          transactionKey: body.transaction_key,
          checkoutRef: body.checkout_ref,
          checkoutUrl: body.checkout_url,
          status: body.status,
          paymentStatus: body.payment_status,
        });
        if (!record) {
          requestLogger.warn('http.webhooks.payments.conflict', { checkoutRef: body.checkout_ref });
          sendJson(res, 409, { error: 'Checkout record changed concurrently; retry the delivery.' });
          return;
        }

        await mergePaymentIntoProfile(
          services.sessions,
          body.session_id,
          { checkoutRef: body.checkout_ref, status: body.status, paymentStatus: body.payment_status },
          services.clock(),
        );
        requestLogger.info('http.webhooks.payments.reconciled', {
          sessionId: body.session_id,
          checkoutRef: body.checkout_ref,
          version: record.version,
        });
        sendJson(res, 200, { ok: true, state: record.state, version: record.version });
      },
    },
  };

  return createServer((req, res) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    const requestLogger = logger.child({ method: req.method, path: pathname });

    const route = routes[pathname];
    if (!route) {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }
    if (req.method !== route.method) {
      sendJson(res, 405, { error: 'Method not allowed', allowed: [route.method] });
      return;
    }

    route.handle(req, res, requestLogger).catch((error: unknown) => {
      sendFailure(res, requestLogger, route.event, error);
    });
  });
}
