import { MotionClassifier, MotionLabelBridge, FeatureVector } from "@/lib/motionLabels";
import { MotionLabel } from "@/lib/types";

/** Answers from a queue; each answer is released by the test */
class QueuedClassifier implements MotionClassifier {
  readonly windows: (readonly FeatureVector[])[] = [];
  private readonly waiting: ((label: MotionLabel) => void)[] = [];

  classify(window: readonly FeatureVector[]): Promise<MotionLabel> {
    this.windows.push(window);
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  release(label: MotionLabel): void {
    const next = this.waiting.shift();
    if (!next) throw new Error("no classification pending");
    next(label);
  }
}

function fixed(label: MotionLabel): MotionClassifier {
  return { classify: () => Promise.resolve(label) };
}

function feed(bridge: MotionLabelBridge, samples: number): void {
  for (let i = 0; i < samples; i++) bridge.onSample(3, 4, 0);
}

describe("MotionLabelBridge", () => {
  test("classifies full windows with the magnitude appended", async () => {
    const classifier = new QueuedClassifier();
    const bridge = new MotionLabelBridge(classifier, { windowSize: 4, stepSize: 2 });
    bridge.start();
    feed(bridge, 3);
    expect(classifier.windows).toHaveLength(0);
    feed(bridge, 1);
    expect(classifier.windows).toHaveLength(1);
    expect(classifier.windows[0][0]).toEqual([3, 4, 0, 5]);

    feed(bridge, 2);
    expect(classifier.windows).toHaveLength(2);
    classifier.release({ label: "walking", confidence: 0.9 });
    classifier.release({ label: "walking", confidence: 0.9 });
    await bridge.drained();
    expect(bridge.inFlight).toBe(0);
  });

  test("labels are lowercased and repeats are not re-emitted", async () => {
    const bridge = new MotionLabelBridge(fixed({ label: "Upstairs", confidence: 0.8 }), { windowSize: 2, stepSize: 2 });
    const seen: MotionLabel[] = [];
    bridge.labels.subscribe((l) => seen.push(l));
    bridge.start();
    feed(bridge, 2);
    await bridge.drained();
    feed(bridge, 2);
    await bridge.drained();
    expect(seen).toEqual([{ label: "upstairs", confidence: 0.8 }]);
  });

  test("results arriving after stop are discarded", async () => {
    const classifier = new QueuedClassifier();
    const bridge = new MotionLabelBridge(classifier, { windowSize: 2, stepSize: 2 });
    const seen: MotionLabel[] = [];
    bridge.labels.subscribe((l) => seen.push(l));
    bridge.start();
    feed(bridge, 2);
    bridge.stop();
    bridge.stop();
    classifier.release({ label: "upstairs", confidence: 0.9 });
    await bridge.drained();
    expect(seen).toEqual([]);
    expect(bridge.isRunning).toBe(false);
  });

  test("windows are skipped while the classifier is saturated", () => {
    const classifier = new QueuedClassifier();
    const bridge = new MotionLabelBridge(classifier, { windowSize: 2, stepSize: 2, maxInFlight: 1 });
    bridge.start();
    feed(bridge, 4);
    expect(classifier.windows).toHaveLength(1);
    expect(bridge.skippedWindows).toBe(1);
  });

  test("a failing classifier emits nothing", async () => {
    const bridge = new MotionLabelBridge(
      { classify: () => Promise.reject(new Error("model unavailable")) },
      { windowSize: 1, stepSize: 1 }
    );
    const seen: MotionLabel[] = [];
    bridge.labels.subscribe((l) => seen.push(l));
    bridge.start();
    feed(bridge, 1);
    await bridge.drained();
    expect(seen).toEqual([]);
  });

  test("samples before start are ignored", () => {
    const classifier = new QueuedClassifier();
    const bridge = new MotionLabelBridge(classifier, { windowSize: 1, stepSize: 1 });
    feed(bridge, 3);
    expect(classifier.windows).toHaveLength(0);
  });
});
