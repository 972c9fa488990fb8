import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { MockGateway } from "../src/adapters/gateways/mock-gateway.js";
import { silentLogger } from "../src/infra/logger.js";
import { buildAppWithRuntime } from "../src/server.js";
import { FakeClock, notificationFor, signedNotification, TEST_API_KEY, testConfig } from "./helpers.js";

function withAuth(headers?: Record<string, string>): Record<string, string> {
  return {
    authorization: `Bearer ${TEST_API_KEY}`,
    ...(headers ?? {}),
  };
}

const paymentPayload = {
  payer_id: 42,
  context_id: 7,
  amount: 5000,
  currency: "xaf",
  kind: "REGISTRATION_FEE",
  description: "Registration fee",
};

describe("Payment API", () => {
  let app: FastifyInstance;
  let gateway: MockGateway;

  beforeEach(async () => {
    gateway = new MockGateway({ name: "mock", baseUrl: "http://gateway.test" });
    app = buildAppWithRuntime(testConfig(), {
      gateways: [gateway],
      clock: new FakeClock(),
      logger: silentLogger(),
    }).app;
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function initiate(payload: Record<string, unknown> = paymentPayload) {
    return app.inject({
      method: "POST",
      url: "/payments/initiate",
      headers: withAuth(),
      payload,
    });
  }

  it("rejects requests without API key", async () => {
    const response = await app.inject({ method: "POST", url: "/payments/initiate", payload: paymentPayload });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.code).toBe("missing_api_key");
  });

  it("rejects unknown API keys", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/payments/statistics",
      headers: { authorization: "Bearer not-a-key" },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.code).toBe("invalid_api_key");
  });

  it("initiates a payment and returns the hosted payment URL", async () => {
    const response = await initiate();

    expect(response.statusCode).toBe(201);
    const body = response.json();
    expect(body).toEqual({
      transaction_id: 1,
      external_reference: body.external_reference,
      payment_url: `http://gateway.test/pay/${body.external_reference}`,
      status: "PENDING",
    });
    expect(body.external_reference).toMatch(/^MOCK_42_7_20260301100000000_[0-9a-f]{6}$/);
    expect(response.headers["x-request-id"]).toBeDefined();
  });

  it("answers validation failures with 422 and the request id", async () => {
    const response = await initiate({ ...paymentPayload, amount: -1 });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      error: {
        code: "invalid_amount",
        message: "Amount must be a positive integer in minor units, got '-1'.",
        request_id: response.headers["x-request-id"],
      },
    });
  });

  it("rejects amounts beyond the exactly representable integer range", async () => {
    const response = await initiate({ ...paymentPayload, amount: 2 ** 53 });

    expect(response.statusCode).toBe(422);
    expect(response.json().error.code).toBe("invalid_amount");
    expect(gateway.initiateCalls).toBe(0);
  });

  it("answers unparseable JSON with invalid_request", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/payments/initiate",
      headers: withAuth({ "content-type": "application/json" }),
      payload: "{not json",
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe("invalid_request");
  });

  it("maps a gateway refusal to 402", async () => {
    const response = await initiate({ ...paymentPayload, currency: "GBP" });

    expect(response.statusCode).toBe(402);
    expect(response.json().error).toMatchObject({
      code: "gateway_rejected",
      message: "Payment gateway rejected the initiation: Currency 'GBP' is not supported.",
    });

    const stored = await app.inject({ method: "GET", url: "/payments/1", headers: withAuth() });
    expect(stored.json().status).toBe("FAILED");
  });

  it("maps an unreachable gateway to 503 and keeps the transaction PENDING", async () => {
    gateway.setUnavailable(true);

    const response = await initiate();

    expect(response.statusCode).toBe(503);
    expect(response.json().error.code).toBe("gateway_unavailable");
    const stored = await app.inject({ method: "GET", url: "/payments/1", headers: withAuth() });
    expect(stored.json().status).toBe("PENDING");
  });

  it("accepts a signed form notification and resolves the transaction", async () => {
    const { external_reference: reference } = (await initiate()).json();
    gateway.setVendorStatus(reference, "ACCEPTED");
    const { fields, signature } = signedNotification(notificationFor(reference));

    const response = await app.inject({
      method: "POST",
      url: "/payments/notification",
      headers: { "content-type": "application/x-www-form-urlencoded", "x-token": signature },
      payload: new URLSearchParams(fields).toString(),
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok", outcome: "applied", external_reference: reference });

    const stored = await app.inject({ method: "GET", url: "/payments/1", headers: withAuth() });
    expect(stored.json()).toMatchObject({
      status: "ACCEPTED",
      gateway_metadata: { operator_transaction_id: `op_${reference}`, payment_method: "MOBILE_MONEY" },
    });
  });

  it("rejects a notification with a bad signature", async () => {
    const { external_reference: reference } = (await initiate()).json();

    const response = await app.inject({
      method: "POST",
      url: "/payments/notification",
      headers: { "x-token": "00ff" },
      payload: notificationFor(reference),
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toMatchObject({
      code: "authentication_failed",
      message: "Notification signature is invalid.",
    });
    expect(gateway.verifyCalls).toBe(0);
  });

  it("shows the payer the current status on return", async () => {
    const { external_reference: reference } = (await initiate()).json();

    const response = await app.inject({
      method: "POST",
      url: `/payments/return?transaction_id=${reference}`,
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      external_reference: reference,
      status: "PENDING",
      amount: 5000,
      currency: "XAF",
    });
  });

  it("reads transactions by id, reference and payer", async () => {
    const { external_reference: reference } = (await initiate()).json();
    await initiate({ ...paymentPayload, payer_id: 43 });

    const byId = await app.inject({ method: "GET", url: "/payments/1", headers: withAuth() });
    const byReference = await app.inject({ method: "GET", url: `/payments/reference/${reference}`, headers: withAuth() });
    const byPayer = await app.inject({ method: "GET", url: "/payments/payers/42", headers: withAuth() });

    expect(byId.json().external_reference).toBe(reference);
    expect(byReference.json().id).toBe(1);
    expect(byPayer.json().data.map((item: { id: number }) => item.id)).toEqual([1]);
  });

  it("returns 404 for unknown transactions and routes", async () => {
    const missing = await app.inject({ method: "GET", url: "/payments/99", headers: withAuth() });
    const route = await app.inject({ method: "GET", url: "/payments/a/b/c", headers: withAuth() });

    expect(missing.statusCode).toBe(404);
    expect(missing.json().error).toMatchObject({
      code: "resource_not_found",
      message: "Transaction '99' not found.",
    });
    expect(route.statusCode).toBe(404);
    expect(route.json().error.code).toBe("resource_not_found");
  });

  it("rejects non-numeric transaction ids", async () => {
    const response = await app.inject({ method: "GET", url: "/payments/abc", headers: withAuth() });

    expect(response.statusCode).toBe(422);
    expect(response.json().error.code).toBe("invalid_id");
  });

  it("reports statistics and rebuilds the reconciliation queue", async () => {
    await initiate();

    const statistics = await app.inject({ method: "GET", url: "/payments/statistics", headers: withAuth() });
    const rebuild = await app.inject({
      method: "POST",
      url: "/payments/reconciliation/rebuild",
      headers: withAuth(),
    });

    expect(statistics.json()).toEqual({
      total: 1,
      by_status: { PENDING: 1, ACCEPTED: 0, REFUSED: 0, FAILED: 0 },
      accepted_amount_by_currency: {},
    });
    expect(rebuild.json()).toEqual({ scanned: 1, enqueued: 0 });
  });

  it("serves health checks without authentication", async () => {
    await initiate();

    const live = await app.inject({ method: "GET", url: "/health/live" });
    const ready = await app.inject({ method: "GET", url: "/health/ready" });

    expect(live.json()).toEqual({ status: "ok" });
    expect(ready.statusCode).toBe(200);
    expect(ready.json()).toEqual({ status: "ready", queue_size: 1 });
  });

  it("exposes Prometheus metrics", async () => {
    await initiate();

    const response = await app.inject({ method: "GET", url: "/metrics" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toBe("text/plain; version=0.0.4; charset=utf-8");
    expect(response.body).toContain(
      'payments_http_requests_total{method="POST",route="/payments/initiate",status_code="201"} 1',
    );
  });
});
