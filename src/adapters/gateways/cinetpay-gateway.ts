import axios, { type AxiosInstance } from "axios";
import type { TransactionRecord } from "../../domain/types.js";
import { GatewayUnavailableError } from "../../domain/errors.js";
import type { Logger } from "../../infra/logger.js";
import type {
  InitiateResult,
  InitiateUrls,
  OperatorMetadata,
  PaymentGatewayPort,
  VerifiedStatus,
  VerifyResult,
} from "../../ports/payment-gateway.js";

export interface CinetPayGatewayOptions {
  baseUrl: string;
  apiKey: string;
  siteId: string;
  timeoutMs: number;
  language: string;
  http?: AxiosInstance;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readString(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return undefined;
}

export function mapVendorStatus(vendorStatus: string): VerifiedStatus {
  switch (vendorStatus.trim().toUpperCase()) {
    case "ACCEPTED":
      return "ACCEPTED";
    case "REFUSED":
    case "CANCELED":
    case "CANCELLED":
      return "REFUSED";
    case "PENDING":
    case "WAITING_FOR_CUSTOMER":
      return "PENDING";
    default:
      // Unrecognized vocabulary never resolves a transaction.
      return "PENDING";
  }
}

export class CinetPayGateway implements PaymentGatewayPort {
  public readonly name = "cinetpay";
  private readonly http: AxiosInstance;

  constructor(
    private readonly options: CinetPayGatewayOptions,
    private readonly logger: Logger,
  ) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: { "Content-Type": "application/json" },
      });
  }

  async initiate(transaction: TransactionRecord, urls: InitiateUrls): Promise<InitiateResult> {
    const body = await this.post("initiate", "/v2/payment", {
      apikey: this.options.apiKey,
      site_id: this.options.siteId,
      transaction_id: transaction.external_reference,
      amount: transaction.amount,
      currency: transaction.currency,
      description: transaction.description ?? `Payment ${transaction.external_reference}`,
      notify_url: urls.notifyUrl,
      return_url: urls.returnUrl,
      channels: "ALL",
      lang: this.options.language,
      customer_id: String(transaction.payer_id),
      customer_name: `Payer ${transaction.payer_id}`,
    });

    const code = readString(body, "code");
    const data = isObject(body.data) ? body.data : {};
    const paymentUrl = readString(data, "payment_url");
    const paymentToken = readString(data, "payment_token");
    if (code === "201" && paymentUrl && paymentToken) {
      return { ok: true, paymentUrl, paymentToken };
    }

    const errorMessage =
      readString(body, "description") ?? readString(body, "message") ?? `gateway answered with code '${code ?? "none"}'`;
    this.logger.warn(
      { external_reference: transaction.external_reference, code, error_message: errorMessage },
      "gateway rejected initiation",
    );
    return { ok: false, errorMessage };
  }

  async verify(externalReference: string): Promise<VerifyResult> {
    const body = await this.post("verify", "/v2/payment/check", {
      apikey: this.options.apiKey,
      site_id: this.options.siteId,
      transaction_id: externalReference,
    });

    const data = isObject(body.data) ? body.data : {};
    const vendorStatus = readString(data, "status") ?? readString(body, "message") ?? "UNKNOWN";
    const operatorMetadata: OperatorMetadata = {};
    const operatorTransactionId = readString(data, "operator_id");
    const paymentMethod = readString(data, "payment_method");
    const paymentDate = readString(data, "payment_date");
    if (operatorTransactionId) {
      operatorMetadata.operatorTransactionId = operatorTransactionId;
    }
    if (paymentMethod) {
      operatorMetadata.paymentMethod = paymentMethod;
    }
    if (paymentDate) {
      operatorMetadata.paymentDate = paymentDate;
    }

    return {
      status: mapVendorStatus(vendorStatus),
      vendorStatus,
      operatorMetadata,
    };
  }

  private async post(operation: "initiate" | "verify", path: string, payload: JsonObject): Promise<JsonObject> {
    let status: number;
    let data: unknown;
    try {
      // 4xx bodies carry the gateway's own error codes and are read as answers.
      const response = await this.http.post<unknown>(path, payload, {
        validateStatus: (code) => code < 500,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      const detail = axios.isAxiosError(error)
        ? error.code === "ECONNABORTED" || error.code === "ETIMEDOUT"
          ? "timeout"
          : error.response
            ? `HTTP ${error.response.status}`
            : error.message
        : String(error);
      this.logger.warn({ operation, path, detail }, "gateway call failed");
      throw new GatewayUnavailableError(operation, detail);
    }

    if (!isObject(data)) {
      this.logger.warn({ operation, path, status }, "gateway returned an unreadable body");
      throw new GatewayUnavailableError(operation, `unreadable response (HTTP ${status})`);
    }
    return data;
  }
}
