import { BuildingDetector } from "@/lib/buildingDetector";
import { StairwellTransitionDetector, UPSTAIRS_LABEL } from "@/lib/stairwellDetector";
import { CampusBuilding, StairPair } from "@/lib/types";

const squareBuilding: CampusBuilding = {
  buildingId: "main",
  floorId: "floor_1",
  floorNumber: 1,
  polygons: [
    [
      { x: 0, y: 0 },
      { x: 100, y: 0 },
      { x: 100, y: 100 },
      { x: 0, y: 100 },
    ],
  ],
  constraintData: { floorId: "floor_1", walls: [], entrances: [] },
};

describe("BuildingDetector", () => {
  test("entering a building reports the change with its constraints", () => {
    const detector = new BuildingDetector();
    detector.loadBuildings([squareBuilding]);
    const result = detector.detect({ x: 50, y: 50 });
    expect(result).toEqual({
      buildingId: "main",
      floorId: "floor_1",
      changed: true,
      newConstraintData: squareBuilding.constraintData,
    });
  });

  test("staying inside is not a change", () => {
    const detector = new BuildingDetector();
    detector.loadBuildings([squareBuilding]);
    detector.setInitial("main", "floor_1");
    expect(detector.detect({ x: 10, y: 10 })).toEqual({ buildingId: "main", floorId: "floor_1", changed: false });
  });

  test("leaving reports outdoors without constraints", () => {
    const detector = new BuildingDetector();
    detector.loadBuildings([squareBuilding]);
    detector.setInitial("main", "floor_1");
    expect(detector.detect({ x: 150, y: 150 })).toEqual({ buildingId: null, floorId: null, changed: true });
    expect(detector.currentBuildingId).toBeNull();
  });

  test("first building in list order wins on overlap", () => {
    const detector = new BuildingDetector();
    detector.loadBuildings([squareBuilding, { ...squareBuilding, buildingId: "annex" }]);
    expect(detector.detect({ x: 50, y: 50 }).buildingId).toBe("main");
  });
});

const pair: StairPair = {
  bottomPosition: { x: 0, y: -100 },
  bottomFloorId: "floor_1",
  bottomFloorNumber: 1,
  topPosition: { x: 20, y: -100 },
  topFloorId: "floor_2",
  topFloorNumber: 2,
};

describe("StairwellTransitionDetector", () => {
  test("a latched candidate is confirmed by an upstairs label", () => {
    const detector = new StairwellTransitionDetector();
    expect(detector.update({ x: 0, y: -40 }, 0, [pair], 1)).toBeNull();
    expect(detector.snapshot.kind).toBe("candidateActive");

    detector.onMotionLabel(UPSTAIRS_LABEL, 0.9);
    const event = detector.update({ x: 0, y: -50 }, 0, [pair], 1);

    expect(event).toEqual({
      stairPair: pair,
      direction: "up",
      startPosition: { x: 0, y: -100 },
      endPosition: { x: 20, y: -100 },
      originFloorId: "floor_1",
      destinationFloorId: "floor_2",
      preClimbedSteps: 2,
      trigger: "candidate",
    });
    expect(detector.snapshot).toEqual({ kind: "noCandidate" });
    expect(detector.labelWindow).toEqual([]);
  });

  test("two upstairs labels confirm exactly one transition", () => {
    const detector = new StairwellTransitionDetector({ windowSize: 3, requiredInWindow: 1 });
    detector.update({ x: 0, y: -40 }, 0, [pair], 1);
    detector.onMotionLabel(UPSTAIRS_LABEL, 0.9);
    detector.onMotionLabel(UPSTAIRS_LABEL, 0.9);

    const first = detector.update({ x: 0, y: -50 }, 0, [pair], 1);
    expect(first?.direction).toBe("up");
    expect(first?.destinationFloorId).toBe("floor_2");
    expect(first?.trigger).toBe("candidate");

    expect(detector.update({ x: 0, y: -60 }, 0, [pair], 1)).toBeNull();
  });

  test("a candidate expires after eight updates without re-acquisition", () => {
    const detector = new StairwellTransitionDetector();
    detector.update({ x: 0, y: -40 }, 0, [pair], 1);
    for (let i = 0; i < 7; i++) detector.update({ x: 0, y: 300 }, 0, [pair], 1);
    expect(detector.snapshot.kind).toBe("candidateActive");

    detector.update({ x: 0, y: 300 }, 0, [pair], 1);
    expect(detector.snapshot).toEqual({ kind: "noCandidate" });

    detector.onMotionLabel(UPSTAIRS_LABEL, 0.9);
    expect(detector.update({ x: 0, y: 300 }, 0, [pair], 1)).toBeNull();
  });

  test("labels alone never confirm far from every stairwell", () => {
    const detector = new StairwellTransitionDetector();
    for (let i = 0; i < 5; i++) {
      detector.onMotionLabel(UPSTAIRS_LABEL, 0.9);
      expect(detector.update({ x: 1000, y: 1000 }, 0, [pair], 1)).toBeNull();
    }
  });

  test("low-confidence labels are dropped", () => {
    const detector = new StairwellTransitionDetector();
    detector.onMotionLabel(UPSTAIRS_LABEL, 0.2);
    expect(detector.labelWindow).toEqual([]);
  });

  test("sustained upstairs labels confirm the nearby pair without facing it", () => {
    const detector = new StairwellTransitionDetector();
    detector.onMotionLabel(UPSTAIRS_LABEL, 0.9);
    detector.onMotionLabel(UPSTAIRS_LABEL, 0.9);
    detector.onMotionLabel(UPSTAIRS_LABEL, 0.9);

    const event = detector.update({ x: 0, y: -40 }, Math.PI, [pair], 1);
    expect(event?.trigger).toBe("sustained");
    expect(event?.preClimbedSteps).toBe(3);
    expect(event?.destinationFloorId).toBe("floor_2");
  });

  test("a non-stair label breaks the streak", () => {
    const detector = new StairwellTransitionDetector();
    detector.onMotionLabel(UPSTAIRS_LABEL, 0.9);
    detector.onMotionLabel(UPSTAIRS_LABEL, 0.9);
    detector.onMotionLabel("walking", 0.9);
    detector.onMotionLabel(UPSTAIRS_LABEL, 0.9);
    expect(detector.update({ x: 0, y: -40 }, Math.PI, [pair], 1)).toBeNull();
  });

  test("going down starts from the top of the pair", () => {
    const detector = new StairwellTransitionDetector();
    detector.update({ x: 20, y: -40 }, 0, [pair], 2);
    detector.onMotionLabel("downstairs", 0.9);
    const event = detector.update({ x: 20, y: -45 }, 0, [pair], 2);
    expect(event?.direction).toBe("down");
    expect(event?.endPosition).toEqual({ x: 0, y: -100 });
    expect(event?.destinationFloorId).toBe("floor_1");
  });
});
