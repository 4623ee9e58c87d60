import { NextResponse } from "next/server";
import { requirePermission } from "@/lib/auth";
import { getCampusStore } from "@/lib/campusStore";
import { parsePoint, parseRoom } from "@/lib/validate";
import { generateDirections } from "@/lib/directions";
import { isLanguage, t } from "@/lib/i18n";
import { loadConfig } from "@/lib/config";
import { createLogger } from "@/lib/logger";

const log = createLogger("api/route");

const OUTCOME_MESSAGES = {
  not_found: "route.notFound",
  no_entrance: "route.noEntrance",
  cancelled: "route.cancelled",
} as const;

/** Route sessions are scoped to the token's subject */
function sessionKey(userId: string, sessionId: string): string {
  return `${userId}:${sessionId}`;
}

function isFields(value: unknown): value is { [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** POST /api/route - Route from a position to a room (requires request_route) */
export async function POST(request: Request) {
  const result = await requirePermission(request, "request_route");
  if (result instanceof Response) return result;
  const { user } = result;

  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: "Request body must be JSON" }, { status: 400 });
  }
  if (!isFields(body)) {
    return NextResponse.json({ error: "Request body must be an object" }, { status: 400 });
  }

  const start = parsePoint(body.start);
  if (!start) {
    return NextResponse.json({ error: "start must be a point" }, { status: 400 });
  }
  const { floorId, sessionId, lang } = body;
  if (typeof floorId !== "string" || floorId.trim().length === 0) {
    return NextResponse.json({ error: "floorId is required" }, { status: 400 });
  }
  const room = parseRoom(body.room);
  if (!room) {
    return NextResponse.json({ error: "room needs a number or a name" }, { status: 400 });
  }
  const session =
    typeof sessionId === "string" && sessionId.length > 0 ? sessionId : sessionId === undefined ? user.sub : null;
  if (session === null) {
    return NextResponse.json({ error: "sessionId must be a string" }, { status: 400 });
  }
  const language = lang === undefined ? "en" : lang;
  if (!isLanguage(language)) {
    return NextResponse.json({ error: "Unsupported language" }, { status: 400 });
  }

  try {
    const store = getCampusStore();
    const outcome = await store.navigation.requestRoute(sessionKey(user.sub, session), {
      room,
      start,
      floorId: floorId.trim(),
    });
    if (outcome.status !== "found") {
      const roomLabel = room.name ?? String(room.number ?? "");
      return NextResponse.json({
        ...outcome,
        message: t(OUTCOME_MESSAGES[outcome.status], language, { room: roomLabel }),
      });
    }
    const destination = outcome.entrance.original.name ?? outcome.entrance.original.roomNo ?? "";
    const directions = generateDirections(
      outcome.route,
      language,
      destination,
      100 * loadConfig().unitsPerCm
    );
    return NextResponse.json({ ...outcome, directions });
  } catch (err) {
    log.error("Route request failed", { error: err instanceof Error ? err.message : String(err) });
    return NextResponse.json({ error: "Failed to compute route" }, { status: 500 });
  }
}

/** DELETE /api/route?sessionId= - Cancel a session's in-flight route */
export async function DELETE(request: Request) {
  const result = await requirePermission(request, "request_route");
  if (result instanceof Response) return result;

  const sessionId = new URL(request.url).searchParams.get("sessionId") ?? result.user.sub;
  const cancelled = getCampusStore().navigation.cancel(sessionKey(result.user.sub, sessionId));
  return NextResponse.json({ sessionId, cancelled });
}
