import {
  Point,
  FloorPlanData,
  BuildingPlacement,
  Wall,
  Entrance,
  BoundaryPolygon,
  BoundaryPoint,
  Room,
} from "./types";

export type Validation<T> = { ok: true; value: T } | { ok: false; errors: string[] };

type Fields = { [key: string]: unknown };

function isObject(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function optionalString(value: unknown): string | null | undefined {
  if (value === undefined || value === null) return value;
  return typeof value === "string" ? value : undefined;
}

export function parsePoint(value: unknown): Point | null {
  if (!isObject(value) || !isFiniteNumber(value.x) || !isFiniteNumber(value.y)) return null;
  return { x: value.x, y: value.y };
}

function parsePlacement(value: unknown, errors: string[], at: string): BuildingPlacement | null {
  if (!isObject(value)) {
    errors.push(`${at}.placement must be an object`);
    return null;
  }
  const offset = parsePoint(value.offset);
  if (!isFiniteNumber(value.scale) || value.scale <= 0) errors.push(`${at}.placement.scale must be a positive number`);
  if (!isFiniteNumber(value.rotationDegrees)) errors.push(`${at}.placement.rotationDegrees must be a number`);
  if (!offset) errors.push(`${at}.placement.offset must be a point`);
  if (!isFiniteNumber(value.scale) || value.scale <= 0 || !isFiniteNumber(value.rotationDegrees) || !offset) {
    return null;
  }
  return { scale: value.scale, rotationDegrees: value.rotationDegrees, offset };
}

function parseWall(value: unknown): Wall | null {
  if (!isObject(value)) return null;
  const { x1, y1, x2, y2 } = value;
  if (!isFiniteNumber(x1) || !isFiniteNumber(y1) || !isFiniteNumber(x2) || !isFiniteNumber(y2)) return null;
  return { x1, y1, x2, y2 };
}

function parseEntrance(value: unknown): Entrance | null {
  if (!isObject(value) || !isFiniteNumber(value.id) || !isFiniteNumber(value.x) || !isFiniteNumber(value.y)) {
    return null;
  }
  const stairs = value.stairs === "top" || value.stairs === "bottom" ? value.stairs : null;
  return {
    id: value.id,
    x: value.x,
    y: value.y,
    name: optionalString(value.name) ?? null,
    roomNo: isFiniteNumber(value.roomNo) ? String(value.roomNo) : optionalString(value.roomNo) ?? null,
    stairs,
    floor: isFiniteNumber(value.floor) ? value.floor : null,
    available: typeof value.available === "boolean" ? value.available : true,
  };
}

function parseBoundaryPoint(value: unknown): BoundaryPoint | null {
  if (!isObject(value) || !isFiniteNumber(value.id) || !isFiniteNumber(value.x) || !isFiniteNumber(value.y)) {
    return null;
  }
  return { id: value.id, x: value.x, y: value.y };
}

/** Parses each element; malformed ones are reported by index */
function parseList<T>(
  value: unknown,
  parse: (item: unknown) => T | null,
  errors: string[],
  at: string
): T[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    errors.push(`${at} must be an array`);
    return [];
  }
  const out: T[] = [];
  value.forEach((item, i) => {
    const parsed = parse(item);
    if (parsed === null) errors.push(`${at}[${i}] is malformed`);
    else out.push(parsed);
  });
  return out;
}

function parseFloor(value: unknown, at: string): Validation<FloorPlanData> {
  const errors: string[] = [];
  if (!isObject(value)) return { ok: false, errors: [`${at} must be an object`] };

  if (!isNonEmptyString(value.buildingId)) errors.push(`${at}.buildingId is required`);
  if (!isNonEmptyString(value.floorId)) errors.push(`${at}.floorId is required`);
  if (!isFiniteNumber(value.floorNumber)) errors.push(`${at}.floorNumber must be a number`);
  const placement = parsePlacement(value.placement, errors, at);
  const walls = parseList(value.walls, parseWall, errors, `${at}.walls`);
  const entrances = parseList(value.entrances, parseEntrance, errors, `${at}.entrances`);
  const boundaryPolygons = parseList(
    value.boundaryPolygons,
    (polygon): BoundaryPolygon | null => {
      if (!isObject(polygon)) return null;
      const points = parseList(polygon.points, parseBoundaryPoint, errors, `${at}.boundaryPolygons.points`);
      return { points };
    },
    errors,
    `${at}.boundaryPolygons`
  );

  if (
    errors.length > 0 ||
    !placement ||
    !isNonEmptyString(value.buildingId) ||
    !isNonEmptyString(value.floorId) ||
    !isFiniteNumber(value.floorNumber)
  ) {
    return { ok: false, errors };
  }
  return {
    ok: true,
    value: {
      buildingId: value.buildingId.trim(),
      floorId: value.floorId.trim(),
      floorNumber: value.floorNumber,
      placement,
      walls,
      entrances,
      boundaryPolygons,
    },
  };
}

/**
 * Validates a floor-plan payload (`{ floors: [...] }` or a bare array).
 * Every problem is reported; nothing throws.
 */
export function validateFloorPlans(input: unknown): Validation<FloorPlanData[]> {
  const list = isObject(input) ? input.floors : input;
  if (!Array.isArray(list)) return { ok: false, errors: ["floors must be an array"] };
  if (list.length === 0) return { ok: false, errors: ["floors must not be empty"] };

  const floors: FloorPlanData[] = [];
  const errors: string[] = [];
  list.forEach((item, i) => {
    const result = parseFloor(item, `floors[${i}]`);
    if (result.ok) floors.push(result.value);
    else errors.push(...result.errors);
  });
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: floors };
}

export function parseRoom(value: unknown): Room | null {
  if (!isObject(value)) return null;
  const raw = value.number;
  const number = isFiniteNumber(raw) ? raw : isNonEmptyString(raw) ? raw.trim() : null;
  const name = isNonEmptyString(value.name) ? value.name : null;
  if (number === null && name === null) return null;
  return {
    number,
    name,
    buildingId: isNonEmptyString(value.buildingId) ? value.buildingId : null,
  };
}
