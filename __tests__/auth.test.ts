import { SignJWT } from "jose";
import {
  createAccessToken,
  verifyToken,
  extractToken,
  hasPermission,
  requirePermission,
} from "@/lib/auth";

const SECRET = "test-secret-for-jest-only-0123456789";

beforeAll(() => {
  process.env.JWT_SECRET = SECRET;
});

const operator = { id: "user-1", username: "ops", role: "operator" as const };

describe("tokens", () => {
  test("round trip keeps identity and role", async () => {
    const token = await createAccessToken(operator);
    const payload = await verifyToken(token);
    expect(payload?.sub).toBe("user-1");
    expect(payload?.username).toBe("ops");
    expect(payload?.role).toBe("operator");
    expect(payload?.type).toBe("access");
  });

  test("a tampered token is rejected", async () => {
    const token = await createAccessToken(operator);
    expect(await verifyToken(`${token}x`)).toBeNull();
  });

  test("a token with an unknown role is rejected", async () => {
    const token = await new SignJWT({ username: "ops", role: "root", type: "access" })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject("user-1")
      .setExpirationTime("5m")
      .sign(new TextEncoder().encode(SECRET));
    expect(await verifyToken(token)).toBeNull();
  });

  test("a short secret is refused", async () => {
    process.env.JWT_SECRET = "too-short";
    try {
      await expect(createAccessToken(operator)).rejects.toThrow("JWT_SECRET");
    } finally {
      process.env.JWT_SECRET = SECRET;
    }
  });
});

describe("request helpers", () => {
  test("token from a bearer header or the access_token cookie", () => {
    expect(extractToken(new Request("http://localhost/", { headers: { authorization: "Bearer abc" } }))).toBe("abc");
    expect(extractToken(new Request("http://localhost/", { headers: { cookie: "a=1; access_token=xyz" } }))).toBe("xyz");
    expect(extractToken(new Request("http://localhost/"))).toBeNull();
  });

  test("role permissions", () => {
    expect(hasPermission("surveyor", "supply_floor_data")).toBe(true);
    expect(hasPermission("viewer", "supply_floor_data")).toBe(false);
    expect(hasPermission("viewer", "request_route")).toBe(true);
  });

  test("missing token is 401, missing permission is 403", async () => {
    const anonymous = await requirePermission(new Request("http://localhost/"), "supply_floor_data");
    expect(anonymous instanceof Response && anonymous.status).toBe(401);

    const token = await createAccessToken({ id: "user-2", username: "guest", role: "viewer" });
    const viewer = await requirePermission(
      new Request("http://localhost/", { headers: { authorization: `Bearer ${token}` } }),
      "supply_floor_data"
    );
    expect(viewer instanceof Response && viewer.status).toBe(403);
  });

  test("an allowed request yields the user", async () => {
    const token = await createAccessToken(operator);
    const result = await requirePermission(
      new Request("http://localhost/", { headers: { authorization: `Bearer ${token}` } }),
      "request_route"
    );
    expect(result instanceof Response).toBe(false);
    if (result instanceof Response) return;
    expect(result.user.username).toBe("ops");
  });
});
