import { buildCampus, buildingsOnLevel, EMPTY_CAMPUS } from "@/lib/campus";
import { FloorPlanData } from "@/lib/types";
import { twoFloorBuilding, ROOM_WALLS } from "./helpers/campusFixture";

describe("buildCampus", () => {
  test("an empty load gives an empty campus", () => {
    const campus = buildCampus([]);
    expect(campus.entrances).toEqual([]);
    expect(campus.stairPairs).toEqual([]);
    expect(campus.floorNumbers.size).toBe(EMPTY_CAMPUS.floorNumbers.size);
  });

  test("indexes walls, entrances and floor numbers by floor id", () => {
    const campus = buildCampus(twoFloorBuilding());
    expect(campus.floorNumbers.get("floor_1")).toBe(1);
    expect(campus.floorNumbers.get("floor_2")).toBe(2);
    expect(campus.wallsByFloor.get("floor_1")).toHaveLength(4);
    expect(campus.entrances).toHaveLength(4);
    expect(campus.constraintsByFloor.get("floor_1")?.entrances).toHaveLength(3);
    expect(campus.buildings.map((b) => `${b.buildingId}/${b.floorId}`)).toEqual(["main/floor_1", "main/floor_2"]);
  });

  test("pairs a bottom stair entrance with the nearest top leading up", () => {
    const campus = buildCampus(twoFloorBuilding());
    expect(campus.stairPairs).toEqual([
      {
        bottomPosition: { x: 100, y: 150 },
        bottomFloorId: "floor_1",
        bottomFloorNumber: 1,
        topPosition: { x: 120, y: 150 },
        topFloorId: "floor_2",
        topFloorNumber: 2,
      },
    ]);
  });

  test("the same stairwell described from both floors is kept once", () => {
    const floors = twoFloorBuilding();
    floors[1] = {
      ...floors[1],
      entrances: [
        ...floors[1].entrances,
        { id: 5, x: 121, y: 151, stairs: "top", floor: 2 },
        { id: 6, x: 101, y: 149, stairs: "bottom", floor: 1 },
      ],
    };
    expect(buildCampus(floors).stairPairs).toHaveLength(1);
  });

  test("a stair pair leading to a floor the building lacks is skipped", () => {
    const [ground] = twoFloorBuilding();
    expect(buildCampus([ground]).stairPairs).toEqual([]);
  });

  test("buildings sharing a floor id are merged under it", () => {
    const annex: FloorPlanData = {
      buildingId: "annex",
      floorId: "floor_1",
      floorNumber: 1,
      placement: { scale: 1, rotationDegrees: 0, offset: { x: 1000, y: 0 } },
      walls: ROOM_WALLS,
      entrances: [],
      boundaryPolygons: [],
    };
    const campus = buildCampus([...twoFloorBuilding(), annex]);
    const walls = campus.wallsByFloor.get("floor_1") ?? [];
    expect(walls).toHaveLength(8);
    expect(walls[4].start).toEqual({ x: 1000, y: 0 });
    expect(campus.constraintsByFloor.get("floor_1")?.walls).toHaveLength(8);
  });
});

describe("buildingsOnLevel", () => {
  test("each building contributes its entry for the level", () => {
    const campus = buildCampus(twoFloorBuilding());
    expect(buildingsOnLevel(campus, 2).map((b) => b.floorId)).toEqual(["floor_2"]);
  });

  test("a building without the level falls back to its lowest floor", () => {
    const campus = buildCampus(twoFloorBuilding());
    expect(buildingsOnLevel(campus, 5).map((b) => b.floorId)).toEqual(["floor_1"]);
  });
});
