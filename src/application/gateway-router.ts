import type { TransactionRecord } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { PaymentMetricsRegistry } from "../infra/metrics.js";
import type {
  InitiateResult,
  InitiateUrls,
  PaymentGatewayPort,
  VerifyResult,
} from "../ports/payment-gateway.js";

export interface GatewayRoutingPolicy {
  defaultGateway: string;
}

interface GatewayRouterOptions {
  metrics?: PaymentMetricsRegistry;
}

function elapsedSeconds(startNs: bigint): number {
  return Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
}

class MeteredGateway implements PaymentGatewayPort {
  public readonly name: string;

  constructor(
    private readonly inner: PaymentGatewayPort,
    private readonly metrics: PaymentMetricsRegistry,
  ) {
    this.name = inner.name;
  }

  async initiate(transaction: TransactionRecord, urls: InitiateUrls): Promise<InitiateResult> {
    const startNs = process.hrtime.bigint();
    try {
      const result = await this.inner.initiate(transaction, urls);
      this.metrics.recordGatewayCall(this.name, "initiate", "ok", elapsedSeconds(startNs));
      return result;
    } catch (error) {
      this.metrics.recordGatewayCall(this.name, "initiate", "error", elapsedSeconds(startNs));
      throw error;
    }
  }

  async verify(externalReference: string): Promise<VerifyResult> {
    const startNs = process.hrtime.bigint();
    try {
      const result = await this.inner.verify(externalReference);
      this.metrics.recordGatewayCall(this.name, "verify", "ok", elapsedSeconds(startNs));
      return result;
    } catch (error) {
      this.metrics.recordGatewayCall(this.name, "verify", "error", elapsedSeconds(startNs));
      throw error;
    }
  }
}

/** Resolves the gateway that handles a transaction by the operator name stored on it. */
export class GatewayRouter {
  private readonly gateways: PaymentGatewayPort[];

  constructor(
    gateways: PaymentGatewayPort[],
    private readonly policy: GatewayRoutingPolicy,
    options: GatewayRouterOptions = {},
  ) {
    const { metrics } = options;
    this.gateways = metrics ? gateways.map((gateway) => new MeteredGateway(gateway, metrics)) : [...gateways];
    if (!this.gateways.some((gateway) => gateway.name === policy.defaultGateway)) {
      throw new AppError(
        500,
        "invalid_runtime_config",
        `Default gateway '${policy.defaultGateway}' is not configured.`,
      );
    }
  }

  default(): PaymentGatewayPort {
    return this.findByName(this.policy.defaultGateway);
  }

  findByName(name: string): PaymentGatewayPort {
    const gateway = this.gateways.find((item) => item.name === name);
    if (gateway) {
      return gateway;
    }
    throw new AppError(500, "gateway_not_configured", `Gateway '${name}' is not configured.`);
  }
}
