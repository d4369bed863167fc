import type { NetworkCounters, SessionEvent, TrafficSample } from "../../../../../../packages/core/src/index";
import type { NetworkCounterReader } from "./network-counter-source";

const DEFAULT_SAMPLE_INTERVAL_MS = 1000;

export type TrafficSamplerState = "IDLE" | "STARTING" | "RUNNING" | "STOPPED";

export interface TrafficSamplerLogger {
  info: (message: string, metadata?: Record<string, unknown>) => void;
  warn: (message: string, metadata?: Record<string, unknown>) => void;
  debug: (message: string, metadata?: Record<string, unknown>) => void;
}

export interface TrafficSamplerOptions {
  readCounters: NetworkCounterReader;
  emit: (event: SessionEvent) => void;
  logger: TrafficSamplerLogger;
  now?: () => Date;
  timing?: {
    intervalMs?: number;
  };
}

const toDelta = (current: number, baseline: number): number => Math.max(0, current - baseline);

/**
 * Emits the bytes sent and received since {@link start} once per interval.
 * A failing counter source stops the sampler with a warning event.
 */
export class TrafficSampler {
  private readonly intervalMs: number;
  private readonly now: () => Date;

  private state: TrafficSamplerState = "IDLE";
  private generation = 0;
  private timer: ReturnType<typeof setInterval> | undefined;
  private inFlight = false;
  private baseline: NetworkCounters | undefined;

  constructor(private readonly options: TrafficSamplerOptions) {
    this.intervalMs = options.timing?.intervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
  }

  get currentState(): TrafficSamplerState {
    return this.state;
  }

  async start(): Promise<void> {
    if (this.state === "RUNNING" || this.state === "STARTING") {
      return;
    }

    this.state = "STARTING";
    const generation = this.bumpGeneration();
    this.inFlight = false;

    let baseline: NetworkCounters;
    try {
      baseline = await this.options.readCounters();
    } catch (error) {
      if (this.isGenerationActive(generation)) {
        this.fail(error);
      }
      return;
    }

    if (!this.isGenerationActive(generation)) {
      return;
    }

    this.baseline = baseline;
    this.state = "RUNNING";
    this.timer = setInterval(() => {
      void this.poll(generation);
    }, this.intervalMs);
    this.options.logger.info("[TrafficSampler] started", { intervalMs: this.intervalMs });
  }

  stop(): void {
    if (this.state === "IDLE" || this.state === "STOPPED") {
      return;
    }

    this.halt();
    this.options.logger.info("[TrafficSampler] stopped");
  }

  private bumpGeneration(): number {
    this.generation += 1;
    return this.generation;
  }

  private isGenerationActive(generation: number): boolean {
    return generation === this.generation && (this.state === "STARTING" || this.state === "RUNNING");
  }

  private halt(): void {
    this.bumpGeneration();
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.inFlight = false;
    this.baseline = undefined;
    this.state = "STOPPED";
  }

  private async poll(generation: number): Promise<void> {
    if (!this.isGenerationActive(generation) || this.state !== "RUNNING") {
      return;
    }

    if (this.inFlight) {
      this.options.logger.debug("[TrafficSampler] drop frame: previous read still running");
      return;
    }

    this.inFlight = true;
    try {
      const counters = await this.options.readCounters();
      const baseline = this.baseline;
      if (!this.isGenerationActive(generation) || !baseline) {
        return;
      }

      const sample: TrafficSample = {
        sentDeltaBytes: toDelta(counters.bytesSent, baseline.bytesSent),
        recvDeltaBytes: toDelta(counters.bytesRecv, baseline.bytesRecv),
        timestamp: this.now().toISOString()
      };
      this.options.emit({ type: "trafficUpdated", sample });
    } catch (error) {
      if (this.isGenerationActive(generation)) {
        this.fail(error);
      }
    } finally {
      if (generation === this.generation) {
        this.inFlight = false;
      }
    }
  }

  private fail(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.halt();
    this.options.logger.warn("[TrafficSampler] counter source failed, sampling stopped", { reason: message });
    this.options.emit({ type: "warning", source: "traffic", message: `Traffic monitor stopped: ${message}` });
  }
}
