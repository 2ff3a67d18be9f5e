import type { Logger } from "../logger";
import { errorMessage } from "../errors";
import { sendWebhook, type WebhookEvent } from "./notificationService";
import type { TenantPolicyStore } from "./tenantPolicyService";

export interface WebhookReceiver {
  readonly name: string;
  /** Throws when the receiver did not accept the event. */
  deliver(event: WebhookEvent): Promise<void>;
}

export class WebhookDeliveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WebhookDeliveryError";
  }
}

/** Posts each event to the webhook URL configured on the event's tenant, if any. */
export class TenantPolicyWebhookReceiver implements WebhookReceiver {
  public readonly name = "tenant-policy";

  constructor(
    private readonly policies: TenantPolicyStore,
    private readonly timeoutMs: number,
  ) {}

  async deliver(event: WebhookEvent): Promise<void> {
    const policy = await this.policies.getPolicy(event.tenantId);
    if (!policy?.webhookUrl) return;

    const result = await sendWebhook(policy.webhookUrl, event.payload, {
      token: policy.webhookToken,
      authType: policy.webhookAuthType,
      timeoutMs: this.timeoutMs,
    });
    if (!result.success) {
      throw new WebhookDeliveryError(result.error ?? "webhook delivery failed");
    }
  }
}

export function createCallbackReceiver(
  name: string,
  handler: (event: WebhookEvent) => void | Promise<void>,
): WebhookReceiver {
  return {
    name,
    async deliver(event) {
      await handler(event);
    },
  };
}

export type WebhookDispatcherOptions = Readonly<{
  maxAttempts: number;
  baseDelayMs: number;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}>;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Fans events out to every registered receiver.
 *
 * notify() returns immediately. Each receiver gets up to `maxAttempts`
 * tries with exponential backoff (base, 2×base, 4×base...). A receiver
 * that keeps failing is logged and dropped for that event; nothing is
 * ever thrown back to the producer.
 */
export class WebhookDispatcher {
  private readonly receivers: WebhookReceiver[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly sequences = new Map<string, number>();
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly opts: WebhookDispatcherOptions) {
    this.sleep = opts.sleep ?? defaultSleep;
  }

  register(receiver: WebhookReceiver): () => void {
    this.receivers.push(receiver);
    return () => {
      const idx = this.receivers.indexOf(receiver);
      if (idx !== -1) this.receivers.splice(idx, 1);
    };
  }

  notify(event: WebhookEvent): void {
    for (const receiver of [...this.receivers]) {
      const delivery = this.deliverWithRetry(receiver, event).finally(() => {
        this.inFlight.delete(delivery);
      });
      this.inFlight.add(delivery);
    }
  }

  nextSequence(mediaBuyId: string): number {
    const next = (this.sequences.get(mediaBuyId) ?? 0) + 1;
    this.sequences.set(mediaBuyId, next);
    return next;
  }

  resetSequence(mediaBuyId: string): void {
    this.sequences.delete(mediaBuyId);
  }

  get pendingDeliveries(): number {
    return this.inFlight.size;
  }

  /** Resolves once every delivery started so far has finished or given up. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private async deliverWithRetry(receiver: WebhookReceiver, event: WebhookEvent): Promise<void> {
    const { maxAttempts, baseDelayMs, logger } = this.opts;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await receiver.deliver(event);
        logger.debug({ receiver: receiver.name, type: event.type, taskId: event.taskId, attempt }, "webhook delivered");
        return;
      } catch (err) {
        logger.warn(
          { receiver: receiver.name, type: event.type, taskId: event.taskId, attempt, maxAttempts, err: errorMessage(err) },
          "webhook delivery attempt failed",
        );
        if (attempt < maxAttempts) {
          await this.sleep(baseDelayMs * 2 ** (attempt - 1));
        }
      }
    }

    logger.error(
      { receiver: receiver.name, type: event.type, taskId: event.taskId, maxAttempts },
      "webhook delivery abandoned",
    );
  }
}
