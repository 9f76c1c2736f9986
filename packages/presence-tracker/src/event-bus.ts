import { InvariantViolationError } from "./errors.js";
import type { Logger } from "./types.js";

export type EventHandler<TPayload> = (payload: TPayload) => Promise<void> | void;

interface Registration<TPayload> {
  name: string;
  handler: EventHandler<TPayload>;
}

type HandlerTable<TEvents> = {
  [TType in keyof TEvents]?: Array<Registration<TEvents[TType]>>;
};

/**
 * In-process fan-out. Handlers run one after another in registration order;
 * each failure is logged and contained so the next handler still runs.
 * Invariant violations are re-thrown once every handler has had its turn.
 */
export class EventBus<TEvents extends object> {
  private readonly handlers: HandlerTable<TEvents> = {};

  constructor(private readonly log: Logger) {}

  on<TType extends keyof TEvents>(
    type: TType,
    name: string,
    handler: EventHandler<TEvents[TType]>,
  ): () => void {
    const registration: Registration<TEvents[TType]> = { name, handler };
    this.handlers[type] = [...this.registrations(type), registration];
    return () => {
      this.handlers[type] = this.registrations(type).filter((entry) => entry !== registration);
    };
  }

  async emit<TType extends keyof TEvents>(type: TType, payload: TEvents[TType]): Promise<void> {
    let fatal: InvariantViolationError | undefined;
    for (const { name, handler } of this.registrations(type)) {
      try {
        await handler(payload);
      } catch (error) {
        if (error instanceof InvariantViolationError) {
          fatal ??= error;
        }
        this.log.error({ err: error, event: String(type), consumer: name }, "event consumer failed");
      }
    }
    if (fatal) {
      throw fatal;
    }
  }

  listenerCount(type: keyof TEvents): number {
    return this.registrations(type).length;
  }

  private registrations<TType extends keyof TEvents>(type: TType): Array<Registration<TEvents[TType]>> {
    return this.handlers[type] ?? [];
  }
}
