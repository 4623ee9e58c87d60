import { FloorPlanData, Wall } from "@/lib/types";

/**
 * One 600 × 300 building on two floors, identity placement.
 *
 *   floor 1: room 101 "Lab" at (500,150), stairs bottom (100,150) → top (120,150)
 *   floor 2: room 201 "Office" at (500,150)
 */
export const ROOM_WALLS: Wall[] = [
  { x1: 0, y1: 0, x2: 600, y2: 0 },
  { x1: 600, y1: 0, x2: 600, y2: 300 },
  { x1: 600, y1: 300, x2: 0, y2: 300 },
  { x1: 0, y1: 300, x2: 0, y2: 0 },
];

const outline = {
  points: [
    { id: 1, x: 0, y: 0 },
    { id: 2, x: 600, y: 0 },
    { id: 3, x: 600, y: 300 },
    { id: 4, x: 0, y: 300 },
  ],
};

const placement = { scale: 1, rotationDegrees: 0, offset: { x: 0, y: 0 } };

export function twoFloorBuilding(): FloorPlanData[] {
  return [
    {
      buildingId: "main",
      floorId: "floor_1",
      floorNumber: 1,
      placement,
      walls: ROOM_WALLS,
      entrances: [
        { id: 1, x: 500, y: 150, name: "Lab", roomNo: "101" },
        { id: 2, x: 100, y: 150, stairs: "bottom", floor: 1 },
        { id: 3, x: 120, y: 150, stairs: "top", floor: 2 },
      ],
      boundaryPolygons: [outline],
    },
    {
      buildingId: "main",
      floorId: "floor_2",
      floorNumber: 2,
      placement,
      walls: ROOM_WALLS,
      entrances: [{ id: 4, x: 500, y: 150, name: "Office", roomNo: "201" }],
      boundaryPolygons: [outline],
    },
  ];
}
