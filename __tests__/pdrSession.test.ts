import { PdrSession, PdrSessionOptions, FloorChange, PositionUpdate } from "@/lib/pdrSession";
import { buildCampus } from "@/lib/campus";
import { MultiFloorRouter } from "@/lib/multiFloorRouter";
import { NavigationService } from "@/lib/navigationService";
import { StairTransitionEvent } from "@/lib/types";
import { twoFloorBuilding } from "./helpers/campusFixture";

const WEST = -Math.PI / 2;
const step = { intervalMs: 500, headingRadians: WEST };

function trackingSession(options: PdrSessionOptions = {}): PdrSession {
  const session = new PdrSession({ sessionId: "test-session", stride: { heightCm: 180 }, ...options });
  session.loadCampus(buildCampus(twoFloorBuilding()));
  return session;
}

describe("PdrSession", () => {
  test("steps are ignored until an origin is set", () => {
    const session = trackingSession();
    expect(session.processStep(step)).toBeNull();
    expect(session.isTracking).toBe(false);
  });

  test("steps are ignored while the height is unknown", () => {
    const session = new PdrSession();
    session.loadCampus(buildCampus(twoFloorBuilding()));
    session.setOrigin({ x: 300, y: 150 }, "floor_1", "main");
    expect(session.processStep(step)).toBeNull();
    session.setHeight(180);
    expect(session.processStep(step)).not.toBeNull();
  });

  test("each step publishes a position on the current floor", () => {
    const session = trackingSession();
    const updates: PositionUpdate[] = [];
    session.positions.subscribe((u) => updates.push(u));
    session.setOrigin({ x: 300, y: 150 }, "floor_1", "main");

    const update = session.processStep(step);
    expect(update?.position.x).toBeCloseTo(248.7);
    expect(update?.position.y).toBeCloseTo(150);
    expect(update?.floorId).toBe("floor_1");
    expect(update?.buildingId).toBe("main");
    expect(update?.visualPath).toHaveLength(2);
    expect(updates).toHaveLength(1);
  });

  test("a confirmed stair climb moves the session to the floor above", () => {
    const session = trackingSession();
    const transitions: StairTransitionEvent[] = [];
    const changes: FloorChange[] = [];
    session.stairTransitions.subscribe((e) => transitions.push(e));
    session.floorChanges.subscribe((c) => changes.push(c));
    session.setOrigin({ x: 300, y: 150 }, "floor_1", "main");

    session.processStep(step);
    session.processStep(step);
    session.submitMotionLabel("upstairs", 0.9);
    const update = session.processStep(step);

    expect(update?.position).toEqual({ x: 120, y: 150 });
    expect(update?.floorId).toBe("floor_2");
    expect(session.currentFloorId).toBe("floor_2");
    expect(transitions).toHaveLength(1);
    expect(transitions[0].preClimbedSteps).toBe(2);
    expect(changes).toEqual([{ previousFloorId: "floor_1", floorId: "floor_2", buildingId: "main", reason: "stairs" }]);
  });

  test("classifier labels reach the stairwell detector", async () => {
    const session = trackingSession({
      classifier: { classify: () => Promise.resolve({ label: "UPSTAIRS", confidence: 0.9 }) },
      motion: { windowSize: 1, stepSize: 1 },
    });
    session.setOrigin({ x: 300, y: 150 }, "floor_1", "main");
    session.processStep(step);
    session.onAccelerometerSample(0, 0, 9.8);
    await new Promise((resolve) => setImmediate(resolve));

    const update = session.processStep(step);
    expect(update?.floorId).toBe("floor_2");
    session.stop();
  });

  test("stop returns the final path and is idempotent", () => {
    const session = trackingSession();
    session.setOrigin({ x: 300, y: 150 }, "floor_1", "main");
    session.processStep(step);
    session.processStep(step);

    const path = session.stop();
    expect(path).toHaveLength(3);
    expect(path[0].position).toEqual({ x: 300, y: 150 });
    expect(session.isTracking).toBe(false);
    expect(session.stop()).toEqual([]);
    expect(session.processStep(step)).toBeNull();
  });

  test("routes from the current position", async () => {
    const router = new MultiFloorRouter();
    router.supplyFloorData(buildCampus(twoFloorBuilding()));
    const session = trackingSession({ navigation: new NavigationService(router) });
    session.setOrigin({ x: 300, y: 150 }, "floor_1", "main");

    const result = await session.requestRoute({ number: "101" });
    expect(result.status).toBe("found");
    if (result.status !== "found") return;
    expect(result.route.segments[0].points[0]).toEqual({ x: 300, y: 150 });
  });

  test("routing needs a navigation service and an origin", async () => {
    await expect(trackingSession().requestRoute({ number: "101" })).rejects.toThrow(
      "Session has no navigation service"
    );
    const router = new MultiFloorRouter();
    const idle = trackingSession({ navigation: new NavigationService(router) });
    await expect(idle.requestRoute({ number: "101" })).rejects.toThrow("Tracking has not started");
  });
});
