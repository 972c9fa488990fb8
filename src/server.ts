import Fastify, { type FastifyInstance } from "fastify";
import { AppError } from "./infra/app-error.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { createRuntime, type PaymentRuntime, type RuntimeOverrides } from "./runtime.js";
import {
  normalizeNotificationFields,
  normalizePositiveInteger,
  normalizeResourceId,
  parseInitiatePaymentInput,
} from "./api/validators.js";

const PUBLIC_ROUTE_PREFIXES = ["/health/", "/payments/notification", "/payments/return"];

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function requestPath(url: string): string {
  return url.split("?")[0] ?? url;
}

export interface BuiltApp {
  app: FastifyInstance;
  runtime: PaymentRuntime;
}

export function buildAppWithRuntime(
  config: RuntimeConfig = loadRuntimeConfig(),
  overrides: RuntimeOverrides = {},
): BuiltApp {
  const app = Fastify({ logger: false });
  const runtime = createRuntime(config, overrides);
  const { metrics, ledger, payments, webhooks, recovery, queue } = runtime;
  const httpLogger = runtime.logger.child({ component: "http" });
  const validApiKeys = new Set<string>(config.apiKeys);
  const requestStarts = new WeakMap<object, bigint>();

  // Gateways post notifications and return redirects as HTML forms.
  app.addContentTypeParser(
    "application/x-www-form-urlencoded",
    { parseAs: "string" },
    (_request, body, done) => {
      done(null, Object.fromEntries(new URLSearchParams(String(body))));
    },
  );

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    try {
      const queueSize = await queue.size();
      return reply.status(200).send({ status: "ready", queue_size: queueSize });
    } catch (error) {
      httpLogger.warn({ err: error }, "readiness check failed");
      return reply.status(503).send({ status: "not_ready" });
    }
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStarts.set(request, process.hrtime.bigint());
    reply.header("X-Request-Id", request.id);
    const path = requestPath(request.url);
    if (PUBLIC_ROUTE_PREFIXES.some((prefix) => path.startsWith(prefix))) {
      return;
    }
    if (config.metricsEnabled && path === "/metrics") {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStarts.get(request);
    if (!startNs) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? requestPath(request.url);
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.post("/payments/initiate", async (request, reply) => {
    const input = parseInitiatePaymentInput(request.body);
    const result = await payments.initiate(input);
    return reply.status(201).send(result);
  });

  app.post("/payments/notification", async (request, reply) => {
    const fields = normalizeNotificationFields(request.body);
    const result = await webhooks.handle({
      fields,
      signature: headerValue(request.headers[config.gateway.signatureHeader]),
      remoteAddress: request.ip,
    });
    return reply.status(200).send({
      status: "ok",
      outcome: result.outcome,
      external_reference: result.external_reference,
    });
  });

  app.post("/payments/return", async (request, reply) => {
    const query = request.query as { transaction_id?: string };
    const body = request.body === undefined || request.body === null ? {} : normalizeNotificationFields(request.body);
    const reference = normalizeResourceId(body.transaction_id ?? query.transaction_id, "transaction_id");
    const transaction = await ledger.getByReference(reference);
    return reply.status(200).send({
      external_reference: transaction.external_reference,
      status: transaction.status,
      amount: transaction.amount,
      currency: transaction.currency,
    });
  });

  app.get("/payments/statistics", async (_request, reply) => {
    return reply.status(200).send(await ledger.statistics());
  });

  app.post("/payments/reconciliation/rebuild", async (_request, reply) => {
    return reply.status(200).send(await recovery.rebuildQueue());
  });

  app.get("/payments/reference/:reference", async (request, reply) => {
    const params = request.params as { reference?: string };
    const reference = normalizeResourceId(params.reference, "reference");
    return reply.status(200).send(await ledger.getByReference(reference));
  });

  app.get("/payments/payers/:payerId", async (request, reply) => {
    const params = request.params as { payerId?: string };
    const payerId = normalizePositiveInteger(params.payerId, "payer_id");
    return reply.status(200).send({ data: await ledger.listByPayer(payerId) });
  });

  app.get("/payments/:id", async (request, reply) => {
    const params = request.params as { id?: string };
    const id = normalizePositiveInteger(params.id, "id");
    return reply.status(200).send(await ledger.get(id));
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        httpLogger.error({ err: error, request_id: request.id }, error.message);
      }
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    // Fastify's own client errors, such as an unparseable body.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    httpLogger.error({ err: error, request_id: request.id }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  app.addHook("onClose", async () => {
    await runtime.close();
  });

  return { app, runtime };
}

export function buildApp(config: RuntimeConfig = loadRuntimeConfig(), overrides: RuntimeOverrides = {}): FastifyInstance {
  return buildAppWithRuntime(config, overrides).app;
}
