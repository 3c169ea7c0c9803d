import type { SideEffectName, SideEffectResult } from "../domain/types.js";
import type { Logger } from "../infra/logger.js";

/**
 * Collects one result per side effect. A failing effect is logged and recorded,
 * and the run goes on with the next one.
 */
export class EffectRecorder {
  readonly results: SideEffectResult[] = [];

  constructor(private readonly logger: Logger) {}

  applied(effect: SideEffectName, detail?: string): void {
    this.results.push({ effect, status: "applied", ...(detail ? { detail } : {}) });
  }

  skipped(effect: SideEffectName, detail: string): void {
    this.results.push({ effect, status: "skipped", detail });
  }

  failed(effect: SideEffectName, error: unknown): void {
    const detail = error instanceof Error ? error.message : String(error);
    this.logger.warn({ err: error, effect }, "fulfillment side effect failed");
    this.results.push({ effect, status: "failed", detail });
  }

  /** Runs `operation`; a returned string becomes the applied detail. */
  async attempt(effect: SideEffectName, operation: () => Promise<string | void>): Promise<boolean> {
    try {
      const detail = await operation();
      this.applied(effect, typeof detail === "string" ? detail : undefined);
      return true;
    } catch (error) {
      this.failed(effect, error);
      return false;
    }
  }
}
