import { NextResponse } from "next/server";
import { requirePermission } from "@/lib/auth";
import { getCampusStore } from "@/lib/campusStore";
import { validateFloorPlans } from "@/lib/validate";
import { createLogger } from "@/lib/logger";

const log = createLogger("api/campus");

/** GET /api/campus - Summary of the loaded floors (public) */
export async function GET() {
  try {
    return NextResponse.json(getCampusStore().summary());
  } catch (err) {
    log.error("Failed to summarize campus", { error: err instanceof Error ? err.message : String(err) });
    return NextResponse.json({ error: "Failed to load campus" }, { status: 500 });
  }
}

/** POST /api/campus - Replace floor data (requires supply_floor_data) */
export async function POST(request: Request) {
  const result = await requirePermission(request, "supply_floor_data");
  if (result instanceof Response) return result;
  const { user } = result;

  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: "Request body must be JSON" }, { status: 400 });
  }

  const validation = validateFloorPlans(body);
  if (!validation.ok) {
    return NextResponse.json(
      { error: "Invalid floor data", details: validation.errors },
      { status: 400 }
    );
  }

  try {
    const summary = getCampusStore().supply(validation.value);
    log.info("Floor data supplied", { by: user.username, floors: validation.value.length });
    return NextResponse.json(summary, { status: 201 });
  } catch (err) {
    log.error("Failed to supply floor data", { error: err instanceof Error ? err.message : String(err) });
    return NextResponse.json({ error: "Failed to supply floor data" }, { status: 500 });
  }
}
