import { v4 as uuidv4 } from "uuid";
import { Point, FloorId, Room, RouteOutcome } from "./types";
import { MultiFloorRouter, RouteCancelledError } from "./multiFloorRouter";
import { createLogger } from "./logger";

const log = createLogger("navigation");

export interface RouteRequest {
  room: Room;
  start: Point;
  floorId: FloorId;
}

export type NavigationResult =
  | (RouteOutcome & { requestId: string })
  | { status: "cancelled"; requestId: string };

interface InFlight {
  requestId: string;
  controller: AbortController;
}

/**
 * Cancellable route requests, one in flight per session. A new request for a
 * session aborts the previous one, which then resolves as "cancelled".
 */
export class NavigationService {
  private readonly inFlight = new Map<string, InFlight>();

  constructor(private readonly router: MultiFloorRouter) {}

  get pendingCount(): number {
    return this.inFlight.size;
  }

  async requestRoute(sessionId: string, request: RouteRequest): Promise<NavigationResult> {
    this.cancel(sessionId);

    const requestId = uuidv4();
    const controller = new AbortController();
    this.inFlight.set(sessionId, { requestId, controller });

    try {
      const outcome = await this.router.routeToRoomAsync(
        request.room,
        request.start,
        request.floorId,
        controller.signal
      );
      return { ...outcome, requestId };
    } catch (err) {
      if (err instanceof RouteCancelledError) {
        log.debug("Route request cancelled", { sessionId, requestId });
        return { status: "cancelled", requestId };
      }
      throw err;
    } finally {
      // A newer request may already own the slot
      if (this.inFlight.get(sessionId)?.requestId === requestId) {
        this.inFlight.delete(sessionId);
      }
    }
  }

  /** Returns true when a request was in flight */
  cancel(sessionId: string): boolean {
    const current = this.inFlight.get(sessionId);
    if (!current) return false;
    current.controller.abort();
    this.inFlight.delete(sessionId);
    return true;
  }

  cancelAll(): void {
    for (const sessionId of [...this.inFlight.keys()]) {
      this.cancel(sessionId);
    }
  }
}
