import crypto from "node:crypto";
import type {
  AppConfig,
  InterviewEventPayload,
  InterviewEventPublisher,
  InterviewEventTopic,
  Logger
} from "@interview-scheduler/shared";

export const SIGNATURE_HEADER = "X-Signature-256";
export const TOPIC_HEADER = "X-Event-Topic";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export function signPayload(rawBody: string, secret: string): string {
  const digest = crypto.createHmac("sha256", secret).update(rawBody).digest("hex");
  return `sha256=${digest}`;
}

/**
 * Receiver-side check for a delivered event: pass the raw request body, the
 * `X-Signature-256` header value and the shared secret.
 */
export function verifyPayloadSignature(rawBody: string, signature: string | null, secret: string): boolean {
  if (!signature) return false;
  const expected = Buffer.from(signPayload(rawBody, secret));
  const received = Buffer.from(signature);
  return expected.length === received.length && crypto.timingSafeEqual(expected, received);
}

export type WebhookEventPublisherOptions = {
  url: string;
  secret?: string | null;
  timeoutMs: number;
  fetchImpl?: FetchLike;
  now?: () => Date;
};

/** POSTs `{ topic, payload, published_at }` to a single endpoint. */
export class WebhookEventPublisher implements InterviewEventPublisher {
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(private readonly options: WebhookEventPublisherOptions) {
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? (() => new Date());
  }

  async publish(topic: InterviewEventTopic, payload: InterviewEventPayload): Promise<void> {
    const body = JSON.stringify({ topic, payload, published_at: this.now().toISOString() });
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      [TOPIC_HEADER]: topic
    };
    if (this.options.secret) {
      headers[SIGNATURE_HEADER] = signPayload(body, this.options.secret);
    }

    const response = await this.fetchImpl(this.options.url, {
      method: "POST",
      headers,
      body,
      signal: AbortSignal.timeout(this.options.timeoutMs)
    });

    if (!response.ok) {
      const errText = await response.text();
      throw new Error(`Event delivery failed: ${response.status} ${errText}`);
    }
  }
}

/** Used when no webhook endpoint is configured. */
export class LogEventPublisher implements InterviewEventPublisher {
  constructor(private readonly logger: Logger) {}

  async publish(topic: InterviewEventTopic, payload: InterviewEventPayload): Promise<void> {
    this.logger.info("interview event", { topic, interviewId: payload.interview_id });
  }
}

export function createEventPublisher(config: AppConfig, logger: Logger): InterviewEventPublisher {
  const { webhookUrl, webhookSecret } = config.events;
  if (!webhookUrl) return new LogEventPublisher(logger);
  return new WebhookEventPublisher({
    url: webhookUrl,
    secret: webhookSecret,
    timeoutMs: config.scheduler.externalTimeoutMs
  });
}
