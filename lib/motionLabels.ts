import { MotionLabel } from "./types";
import { Channel } from "./channel";
import { createLogger } from "./logger";

const log = createLogger("motion");

/** acc_x, acc_y, acc_z, magnitude */
export type FeatureVector = readonly [number, number, number, number];

/** The on-device model; only its label/confidence output matters here */
export interface MotionClassifier {
  classify(window: readonly FeatureVector[]): Promise<MotionLabel>;
}

export interface MotionBridgeOptions {
  /** Samples per inference window */
  windowSize: number;
  /** Samples dropped from the front after each window */
  stepSize: number;
  /** Windows arriving while this many inferences run are skipped */
  maxInFlight: number;
  /** Same label with a confidence change at most this large is not re-emitted */
  confidenceDelta: number;
}

export const DEFAULT_MOTION_OPTIONS: MotionBridgeOptions = {
  windowSize: 100,
  stepSize: 50,
  maxInFlight: 2,
  confidenceDelta: 0.05,
};

/**
 * Windows accelerometer samples and hands them to an asynchronous
 * classifier without ever blocking the sampling side. Results may arrive out
 * of order; results belonging to a stopped run are discarded.
 */
export class MotionLabelBridge {
  readonly labels = new Channel<MotionLabel>();

  private readonly options: MotionBridgeOptions;
  private samples: FeatureVector[] = [];
  private readonly pending = new Set<Promise<void>>();
  private running = false;
  private generation = 0;
  private last: MotionLabel | null = null;
  private skipped = 0;

  constructor(
    private readonly classifier: MotionClassifier,
    options: Partial<MotionBridgeOptions> = {}
  ) {
    this.options = { ...DEFAULT_MOTION_OPTIONS, ...options };
  }

  get isRunning(): boolean {
    return this.running;
  }

  get inFlight(): number {
    return this.pending.size;
  }

  /** Windows dropped because the classifier was saturated */
  get skippedWindows(): number {
    return this.skipped;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.samples = [];
    this.last = null;
  }

  /** Idempotent; results of inferences still running are dropped */
  stop(): void {
    this.running = false;
    this.generation++;
    this.samples = [];
    this.last = null;
  }

  onSample(x: number, y: number, z: number): void {
    if (!this.running) return;
    this.samples.push([x, y, z, Math.sqrt(x * x + y * y + z * z)]);
    if (this.samples.length < this.options.windowSize) return;

    const window = this.samples.slice(0, this.options.windowSize);
    this.samples = this.samples.slice(Math.min(this.options.stepSize, this.samples.length));

    if (this.pending.size >= this.options.maxInFlight) {
      this.skipped++;
      return;
    }
    const task: Promise<void> = this.infer(window, this.generation).finally(() => {
      this.pending.delete(task);
    });
    this.pending.add(task);
  }

  /** Resolves once every inference started so far has settled */
  async drained(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async infer(window: FeatureVector[], generation: number): Promise<void> {
    try {
      const result = await this.classifier.classify(window);
      if (generation !== this.generation) return;
      this.publish(result);
    } catch (err) {
      log.warn("Motion classification failed", { error: err instanceof Error ? err.message : String(err) });
    }
  }

  private publish(result: MotionLabel): void {
    const label = result.label.toLowerCase();
    const last = this.last;
    if (last && last.label === label && Math.abs(last.confidence - result.confidence) <= this.options.confidenceDelta) {
      return;
    }
    this.last = { label, confidence: result.confidence };
    this.labels.emit(this.last);
  }
}
