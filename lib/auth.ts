import { SignJWT, jwtVerify, type JWTPayload } from "jose";

// ─── JWT Secret: MANDATORY, no fallback ───
function getJwtSecret(): Uint8Array {
  const secret = process.env.JWT_SECRET;
  if (!secret || secret.length < 32) {
    throw new Error(
      "FATAL: JWT_SECRET environment variable is missing or too short (min 32 chars). " +
      "Set it in .env before starting the app."
    );
  }
  return new TextEncoder().encode(secret);
}

function accessExpiry(): string {
  return process.env.JWT_ACCESS_EXPIRY || "15m";
}

// ─── Types ───
export type Role = "operator" | "surveyor" | "viewer";

export interface ServiceUser {
  id: string;
  username: string;
  role: Role;
}

export interface TokenPayload {
  sub: string;
  username: string;
  role: Role;
  type: "access";
  iat?: number;
  exp?: number;
}

// ─── RBAC Permissions ───
export type Permission = "supply_floor_data" | "view_campus" | "request_route";

const ROLE_PERMISSIONS: Record<Role, Permission[]> = {
  operator: ["supply_floor_data", "view_campus", "request_route"],
  surveyor: ["supply_floor_data", "view_campus"],
  viewer: ["view_campus", "request_route"],
};

function isRole(value: unknown): value is Role {
  return value === "operator" || value === "surveyor" || value === "viewer";
}

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role]?.includes(permission) ?? false;
}

// ─── Token Creation ───
export async function createAccessToken(user: ServiceUser): Promise<string> {
  return new SignJWT({ username: user.username, role: user.role, type: "access" as const })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(user.id)
    .setIssuedAt()
    .setExpirationTime(accessExpiry())
    .sign(getJwtSecret());
}

async function decode(token: string): Promise<JWTPayload | null> {
  const secret = getJwtSecret();
  try {
    const { payload } = await jwtVerify(token, secret, { algorithms: ["HS256"] });
    return payload;
  } catch {
    return null;
  }
}

/** Verify and decode a JWT token; null when invalid, expired or malformed */
export async function verifyToken(token: string): Promise<TokenPayload | null> {
  const payload = await decode(token);
  if (!payload) return null;
  const { sub, username, role, type, iat, exp } = payload;
  if (typeof sub !== "string" || typeof username !== "string" || !isRole(role) || type !== "access") {
    return null;
  }
  return { sub, username, role, type: "access", iat, exp };
}

/** Extract token from Authorization header or cookie */
export function extractToken(request: Request): string | null {
  const authHeader = request.headers.get("authorization");
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice(7);
  }
  const cookie = request.headers.get("cookie");
  if (cookie) {
    const match = cookie.match(/access_token=([^;]+)/);
    if (match) return match[1];
  }
  return null;
}

/** Verify the request carries a valid access token */
export async function authenticateRequest(
  request: Request
): Promise<{ authenticated: true; user: TokenPayload } | { authenticated: false; error: string }> {
  const token = extractToken(request);
  if (!token) {
    return { authenticated: false, error: "No authentication token provided" };
  }
  const payload = await verifyToken(token);
  if (!payload) {
    return { authenticated: false, error: "Invalid or expired token" };
  }
  return { authenticated: true, user: payload };
}

/** Resolves to the user, or to a 401/403 JSON Response */
export async function requirePermission(
  request: Request,
  permission: Permission
): Promise<{ user: TokenPayload } | Response> {
  const auth = await authenticateRequest(request);
  if (!auth.authenticated) {
    return new Response(JSON.stringify({ error: auth.error }), {
      status: 401,
      headers: { "Content-Type": "application/json" },
    });
  }
  if (!hasPermission(auth.user.role, permission)) {
    return new Response(
      JSON.stringify({ error: "Insufficient permissions" }),
      { status: 403, headers: { "Content-Type": "application/json" } }
    );
  }
  return { user: auth.user };
}
