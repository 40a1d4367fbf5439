// Abstract base class for LLM providers.
//
// Wraps the subclass's _stream() implementation and warns at runtime
// if no usage event was yielded, since the session's token totals and
// cost would then silently stay at zero for that turn.

import type { Logger, Provider, ProviderOptions, ProviderRequest, StreamEvent } from "./types";
import { ConsoleLogger } from "./types";

export abstract class AbstractProvider implements Provider {
  abstract readonly name: string;

  constructor(protected readonly logger: Logger = new ConsoleLogger("warn")) {}

  async *stream(request: ProviderRequest, options?: ProviderOptions): AsyncIterable<StreamEvent> {
    let sawUsage = false;
    let failed = false;
    for await (const event of this._stream(request, options)) {
      if (event.type === "usage") sawUsage = true;
      if (event.type === "error") failed = true;
      yield event;
    }
    if (!sawUsage && !failed && !options?.signal?.aborted) {
      this.logger.warn("Provider did not yield a usage event; usage totals will not include this turn", {
        provider: this.name,
        model: request.config.model,
      });
    }
  }

  protected abstract _stream(
    request: ProviderRequest,
    options?: ProviderOptions,
  ): AsyncIterable<StreamEvent>;
}
