import { randomUUID } from "node:crypto";
import type { TransactionRecord } from "../../domain/types.js";
import { GatewayUnavailableError } from "../../domain/errors.js";
import type {
  InitiateResult,
  InitiateUrls,
  OperatorMetadata,
  PaymentGatewayPort,
  VerifyResult,
} from "../../ports/payment-gateway.js";
import { mapVendorStatus } from "./cinetpay-gateway.js";

interface MockGatewayOptions {
  name: string;
  baseUrl: string;
  supportedCurrencies?: string[];
}

/** Development gateway that answers locally; vendor statuses are set by hand. */
export class MockGateway implements PaymentGatewayPort {
  public readonly name: string;
  private readonly supportedCurrencies: Set<string>;
  private readonly vendorStatuses = new Map<string, string>();
  private unavailable = false;
  public initiateCalls = 0;
  public verifyCalls = 0;

  constructor(private readonly options: MockGatewayOptions) {
    this.name = options.name;
    this.supportedCurrencies = new Set(options.supportedCurrencies ?? ["XAF", "XOF", "EUR", "USD"]);
  }

  setVendorStatus(externalReference: string, vendorStatus: string): void {
    this.vendorStatuses.set(externalReference, vendorStatus);
  }

  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  async initiate(transaction: TransactionRecord, _urls: InitiateUrls): Promise<InitiateResult> {
    this.initiateCalls += 1;
    if (this.unavailable) {
      throw new GatewayUnavailableError("initiate", "mock gateway is unavailable");
    }
    if (!this.supportedCurrencies.has(transaction.currency)) {
      return { ok: false, errorMessage: `Currency '${transaction.currency}' is not supported.` };
    }
    return {
      ok: true,
      paymentUrl: `${this.options.baseUrl}/pay/${transaction.external_reference}`,
      paymentToken: `tok_${randomUUID()}`,
    };
  }

  async verify(externalReference: string): Promise<VerifyResult> {
    this.verifyCalls += 1;
    if (this.unavailable) {
      throw new GatewayUnavailableError("verify", "mock gateway is unavailable");
    }
    const vendorStatus = this.vendorStatuses.get(externalReference) ?? "PENDING";
    const status = mapVendorStatus(vendorStatus);
    const operatorMetadata: OperatorMetadata =
      status === "ACCEPTED"
        ? { operatorTransactionId: `op_${externalReference}`, paymentMethod: "MOBILE_MONEY" }
        : {};
    return { status, vendorStatus, operatorMetadata };
  }
}
