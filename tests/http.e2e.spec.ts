import { afterAll, beforeAll, describe, it, expect, vi } from "vitest";
import { ADMIN, TokenResponse, WithId, startGateway } from "./harness.js";
import type { TestGateway } from "./harness.js";
import type { ExternalUserInfo, IdentityProvider } from "../src/adapters/types.js";

const USER = { email: "uma@example.test", password: "right-password" };

describe("gateway over HTTP (local mode)", () => {
  let gw: TestGateway;
  let adminToken: string;
  let userToken: string;
  let userId: number;
  const sent: { email: string; token: string }[] = [];

  beforeAll(async () => {
    gw = await startGateway(
      {},
      {
        notifier: {
          notify: vi.fn(async (n: { email: string; token: string }) => {
            sent.push({ email: n.email, token: n.token });
          }),
        },
      },
    );
    const registered = await gw.call("POST", "/api/v1/auth/register", {
      body: { email: USER.email, name: "Uma", password: USER.password },
    });
    expect(registered.status).toBe(201);
    userId = WithId.parse(registered.body).id;
    adminToken = (await gw.login(ADMIN.email, ADMIN.password)).access_token;
    userToken = (await gw.login(USER.email, USER.password)).access_token;
  });

  afterAll(async () => {
    await gw.stop();
  });

  it("serves the welcome and health endpoints", async () => {
    expect((await gw.call("GET", "/")).body).toEqual({
      message: "Storefront gateway",
      docs: "/api/v1",
    });
    expect((await gw.call("GET", "/health")).body).toEqual({
      status: "ok",
      authMode: "local",
    });
  });

  describe("auth", () => {
    it("login with correct credentials returns a bearer pair", async () => {
      const res = await gw.call("POST", "/api/v1/auth/login", {
        body: { email: USER.email, password: USER.password },
      });
      expect(res.status).toBe(200);
      const tokens = TokenResponse.parse(res.body);
      expect(tokens.token_type).toBe("bearer");
      expect(tokens.external_id).toBeUndefined();
    });

    it("accepts a password-grant form with username", async () => {
      const res = await gw.call("POST", "/api/v1/auth/login", {
        form: { username: USER.email, password: USER.password },
      });
      expect(res.status).toBe(200);
    });

    it("wrong password and unknown email look the same", async () => {
      const wrong = await gw.call("POST", "/api/v1/auth/login", {
        body: { email: USER.email, password: "wrong-password" },
      });
      const unknown = await gw.call("POST", "/api/v1/auth/login", {
        body: { email: "ghost@example.test", password: "wrong-password" },
      });
      const expected = {
        error: {
          code: "AUTH_INVALID_CREDENTIALS",
          message: "Incorrect email or password",
        },
      };
      expect(wrong.status).toBe(401);
      expect(unknown.status).toBe(401);
      expect(wrong.body).toEqual(expected);
      expect(unknown.body).toEqual(expected);
      expect(wrong.headers.get("www-authenticate")).toBe("Bearer");
    });

    it("rejects protected routes without a token", async () => {
      const res = await gw.call("GET", "/api/v1/auth/me");
      expect(res.status).toBe(401);
      expect(res.body).toEqual({
        error: { code: "AUTH_UNAUTHORIZED", message: "Not authenticated" },
      });
    });

    it("returns the caller's profile", async () => {
      const res = await gw.call("GET", "/api/v1/auth/me", { token: userToken });
      expect(res.body).toEqual({
        id: String(userId),
        source: "local",
        email: USER.email,
        name: "Uma",
        isActive: true,
        isElevated: false,
      });
    });

    it("a logged-out token is rejected on reuse", async () => {
      const { access_token } = await gw.login(USER.email, USER.password);
      const out = await gw.call("POST", "/api/v1/auth/logout", { token: access_token });
      expect(out.status).toBe(200);

      const reuse = await gw.call("GET", "/api/v1/auth/me", { token: access_token });
      expect(reuse.status).toBe(401);
      expect(reuse.body).toEqual({
        error: { code: "AUTH_TOKEN_REVOKED", message: "Token has been revoked" },
      });
    });

    it("refresh rotates the pair and rejects replay", async () => {
      const { refresh_token } = await gw.login(USER.email, USER.password);
      const first = await gw.call("POST", "/api/v1/auth/refresh", {
        body: { refresh_token },
      });
      expect(first.status).toBe(200);
      const next = TokenResponse.parse(first.body);
      expect((await gw.call("GET", "/api/v1/auth/me", { token: next.access_token })).status).toBe(200);

      const replay = await gw.call("POST", "/api/v1/auth/refresh", {
        body: { refresh_token },
      });
      expect(replay.status).toBe(401);
    });

    it("refresh refuses an access token", async () => {
      const res = await gw.call("POST", "/api/v1/auth/refresh", {
        body: { refresh_token: userToken },
      });
      expect(res.status).toBe(401);
      expect(res.body).toEqual({
        error: { code: "AUTH_TOKEN_INVALID", message: "Wrong token kind, expected refresh" },
      });
    });

    it("registering an existing email is a conflict", async () => {
      const res = await gw.call("POST", "/api/v1/auth/register", {
        body: { email: USER.email, name: "Again", password: "another-password" },
      });
      expect(res.status).toBe(409);
      expect(res.body).toEqual({
        error: { code: "CONFLICT", message: "Email already registered" },
      });
    });
  });

  describe("users", () => {
    it("lets a user read themselves but not others", async () => {
      const self = await gw.call("GET", `/api/v1/users/${userId}`, { token: userToken });
      expect(self.status).toBe(200);
      expect(self.body).not.toHaveProperty("hashedPassword");

      const other = await gw.call("GET", "/api/v1/users/1", { token: userToken });
      expect(other.status).toBe(403);
    });

    it("only an admin may change the active flag", async () => {
      const mine = await gw.call("PUT", `/api/v1/users/${userId}`, {
        token: userToken,
        body: { isActive: false },
      });
      expect(mine.status).toBe(403);

      const renamed = await gw.call("PUT", `/api/v1/users/${userId}`, {
        token: userToken,
        body: { phone: "555-0100" },
      });
      expect(renamed.status).toBe(200);
      expect(renamed.body).toMatchObject({ phone: "555-0100", isActive: true });
    });

    it("lists users for admins only", async () => {
      expect((await gw.call("GET", "/api/v1/users", { token: userToken })).status).toBe(403);
      const res = await gw.call("GET", "/api/v1/users", { token: adminToken });
      expect(res.status).toBe(200);
      expect(Array.isArray(res.body) && res.body.length).toBe(2);
    });

    it("resets a password through the emailed token", async () => {
      const email = "pat@example.test";
      await gw.call("POST", "/api/v1/auth/register", {
        body: { email, name: "Pat", password: "first-password" },
      });

      const unknown = await gw.call("POST", "/api/v1/users/password-reset", {
        body: { email: "nobody@example.test" },
      });
      const known = await gw.call("POST", "/api/v1/users/password-reset", {
        body: { email },
      });
      expect(unknown.status).toBe(202);
      expect(known.body).toEqual(unknown.body);
      expect(sent.map((s) => s.email)).toEqual([email]);

      const token = sent[0]?.token ?? "";
      const confirm = await gw.call("POST", "/api/v1/users/password-reset/confirm", {
        body: { token, newPassword: "second-password" },
      });
      expect(confirm.status).toBe(200);
      await expect(gw.login(email, "second-password")).resolves.toBeDefined();
      await expect(gw.login(email, "first-password")).rejects.toThrow("login failed with 401");

      const reuse = await gw.call("POST", "/api/v1/users/password-reset/confirm", {
        body: { token, newPassword: "third-password" },
      });
      expect(reuse.status).toBe(400);
      expect(reuse.body).toEqual({
        error: { code: "VALIDATION_ERROR", message: "Invalid or expired token" },
      });
    });
  });

  describe("catalog", () => {
    it("product update: 403 for a regular user, 200 for an admin, list reflects it", async () => {
      const created = await gw.call("POST", "/api/v1/products", {
        token: adminToken,
        body: { name: "Lamp", listPrice: 10 },
      });
      expect(created.status).toBe(201);
      const { id } = WithId.parse(created.body);

      const before = await gw.call("GET", "/api/v1/products?search=Lamp");
      expect(before.body).toMatchObject([{ id, listPrice: 10 }]);

      const denied = await gw.call("PUT", `/api/v1/products/${id}`, {
        token: userToken,
        body: { listPrice: 15 },
      });
      expect(denied.status).toBe(403);
      expect(denied.body).toEqual({
        error: { code: "AUTH_FORBIDDEN", message: "Not enough permissions" },
      });

      const allowed = await gw.call("PUT", `/api/v1/products/${id}`, {
        token: adminToken,
        body: { listPrice: 15 },
      });
      expect(allowed.status).toBe(200);
      expect(allowed.body).toMatchObject({ id, name: "Lamp", listPrice: 15 });

      const after = await gw.call("GET", "/api/v1/products?search=Lamp");
      expect(after.body).toMatchObject([{ id, listPrice: 15 }]);
      const single = await gw.call("GET", `/api/v1/products/${id}`);
      expect(single.body).toMatchObject({ id, listPrice: 15 });
    });

    it("moving a product between categories refreshes both listings", async () => {
      const cat = async (name: string) =>
        WithId.parse(
          (
            await gw.call("POST", "/api/v1/categories", {
              token: adminToken,
              body: { name },
            })
          ).body,
        ).id;
      const a = await cat("Indoor");
      const b = await cat("Outdoor");
      const product = WithId.parse(
        (
          await gw.call("POST", "/api/v1/products", {
            token: adminToken,
            body: { name: "Bench", listPrice: 40, categoryIds: [a] },
          })
        ).body,
      );

      const ids = async (categoryId: number) => {
        const res = await gw.call("GET", `/api/v1/categories/${categoryId}/products`);
        return WithId.array().parse(res.body).map((p) => p.id);
      };
      expect(await ids(a)).toEqual([product.id]);
      expect(await ids(b)).toEqual([]);
      expect(gw.cache.keys()).toContain(
        `category:${a}:products:list:limit=100&skip=0`,
      );

      await gw.call("PUT", `/api/v1/products/${product.id}`, {
        token: adminToken,
        body: { categoryIds: [b] },
      });
      expect(await ids(a)).toEqual([]);
      expect(await ids(b)).toEqual([product.id]);
    });

    it("rejects references to missing entities", async () => {
      const res = await gw.call("POST", "/api/v1/products", {
        token: adminToken,
        body: { name: "Ghost", listPrice: 1, vendorId: 999 },
      });
      expect(res.status).toBe(404);
      expect(res.body).toEqual({
        error: { code: "NOT_FOUND", message: "Vendor not found" },
      });
    });

    it("serves vendors and their products", async () => {
      const vendor = WithId.parse(
        (
          await gw.call("POST", "/api/v1/vendors", {
            token: adminToken,
            body: { name: "Acme", city: "Springfield" },
          })
        ).body,
      );
      await gw.call("POST", "/api/v1/products", {
        token: adminToken,
        body: { name: "Anvil", listPrice: 99, vendorId: vendor.id },
      });
      const res = await gw.call("GET", `/api/v1/vendors/${vendor.id}/products`);
      expect(res.body).toMatchObject([{ name: "Anvil", vendorId: vendor.id }]);

      expect((await gw.call("GET", "/api/v1/vendors/999")).status).toBe(404);
    });

    it("deleting a category updates products listed under another category", async () => {
      const cat = async (name: string) =>
        WithId.parse(
          (await gw.call("POST", "/api/v1/categories", { token: adminToken, body: { name } }))
            .body,
        ).id;
      const a = await cat("Seasonal");
      const b = await cat("Garden");
      const product = WithId.parse(
        (
          await gw.call("POST", "/api/v1/products", {
            token: adminToken,
            body: { name: "Planter", listPrice: 12, categoryIds: [a, b] },
          })
        ).body,
      );

      const listed = await gw.call("GET", `/api/v1/categories/${b}/products`);
      expect(listed.body).toMatchObject([{ id: product.id, categoryIds: [a, b] }]);

      const removed = await gw.call("DELETE", `/api/v1/categories/${a}`, { token: adminToken });
      expect(removed.status).toBe(204);

      const relisted = await gw.call("GET", `/api/v1/categories/${b}/products`);
      expect(relisted.body).toMatchObject([{ id: product.id, categoryIds: [b] }]);
    });

    it("deleting a vendor updates category listings of its products", async () => {
      const vendor = WithId.parse(
        (await gw.call("POST", "/api/v1/vendors", { token: adminToken, body: { name: "Brief" } }))
          .body,
      );
      const category = WithId.parse(
        (await gw.call("POST", "/api/v1/categories", { token: adminToken, body: { name: "Tools" } }))
          .body,
      );
      const product = WithId.parse(
        (
          await gw.call("POST", "/api/v1/products", {
            token: adminToken,
            body: {
              name: "Hammer",
              listPrice: 20,
              vendorId: vendor.id,
              categoryIds: [category.id],
            },
          })
        ).body,
      );

      const listed = await gw.call("GET", `/api/v1/categories/${category.id}/products`);
      expect(listed.body).toMatchObject([{ id: product.id, vendorId: vendor.id }]);

      const removed = await gw.call("DELETE", `/api/v1/vendors/${vendor.id}`, {
        token: adminToken,
      });
      expect(removed.status).toBe(204);

      const relisted = await gw.call("GET", `/api/v1/categories/${category.id}/products`);
      expect(relisted.body).toMatchObject([{ id: product.id, vendorId: null }]);
      const single = await gw.call("GET", `/api/v1/products/${product.id}`);
      expect(single.body).toMatchObject({ vendorId: null });
    });

    it("manages attributes, values and variants with fresh reads after writes", async () => {
      const attribute = await gw.call("POST", "/api/v1/attributes", {
        token: adminToken,
        body: { name: "Color" },
      });
      expect(attribute.status).toBe(201);
      expect(attribute.body).toMatchObject({
        name: "Color",
        displayType: "radio",
        isCustom: false,
        sequence: 0,
      });
      const attributeId = WithId.parse(attribute.body).id;

      const denied = await gw.call("POST", `/api/v1/attributes/${attributeId}/values`, {
        token: userToken,
        body: { name: "Red" },
      });
      expect(denied.status).toBe(403);

      const value = async (name: string) =>
        WithId.parse(
          (
            await gw.call("POST", `/api/v1/attributes/${attributeId}/values`, {
              token: adminToken,
              body: { name },
            })
          ).body,
        ).id;
      const red = await value("Red");
      expect(
        (await gw.call("GET", `/api/v1/attributes/${attributeId}/values`)).body,
      ).toMatchObject([{ id: red, name: "Red", attributeId }]);
      const blue = await value("Blue");
      expect(
        WithId.array()
          .parse((await gw.call("GET", `/api/v1/attributes/${attributeId}/values`)).body)
          .map((v) => v.id),
      ).toEqual([red, blue]);

      const product = WithId.parse(
        (
          await gw.call("POST", "/api/v1/products", {
            token: adminToken,
            body: { name: "Scarf", listPrice: 15 },
          })
        ).body,
      );
      const missingValue = await gw.call("POST", "/api/v1/variants", {
        token: adminToken,
        body: { productId: product.id, sku: "SCARF-X", price: 15, attributeValueIds: [9999] },
      });
      expect(missingValue.body).toEqual({
        error: { code: "NOT_FOUND", message: "Attribute value not found" },
      });

      const variant = await gw.call("POST", "/api/v1/variants", {
        token: adminToken,
        body: { productId: product.id, sku: "SCARF-RED", price: 15, attributeValueIds: [red] },
      });
      expect(variant.status).toBe(201);
      const variantId = WithId.parse(variant.body).id;
      expect((await gw.call("GET", `/api/v1/variants/${variantId}`)).body).toMatchObject({
        attributeValueIds: [red],
      });
      expect((await gw.call("GET", `/api/v1/products/${product.id}/variants`)).body).toMatchObject(
        [{ id: variantId, sku: "SCARF-RED", priceExtra: 0, barcode: null, attributeValueIds: [red] }],
      );

      const duplicate = await gw.call("POST", "/api/v1/variants", {
        token: adminToken,
        body: { productId: product.id, sku: "SCARF-RED", price: 16 },
      });
      expect(duplicate.status).toBe(409);
      expect(duplicate.body).toEqual({
        error: { code: "CONFLICT", message: "SKU already exists" },
      });

      const deletedRed = await gw.call(
        "DELETE",
        `/api/v1/attributes/${attributeId}/values/${red}`,
        { token: adminToken },
      );
      expect(deletedRed.status).toBe(204);
      expect((await gw.call("GET", `/api/v1/variants/${variantId}`)).body).toMatchObject({
        attributeValueIds: [],
      });
      expect((await gw.call("GET", `/api/v1/products/${product.id}/variants`)).body).toMatchObject(
        [{ id: variantId, attributeValueIds: [] }],
      );

      await gw.call("DELETE", `/api/v1/products/${product.id}`, { token: adminToken });
      expect((await gw.call("GET", `/api/v1/variants/${variantId}`)).status).toBe(404);
      expect((await gw.call("GET", `/api/v1/products/${product.id}/variants`)).status).toBe(404);
    });

    it("sync clears product caches for admins", async () => {
      await gw.call("GET", "/api/v1/products");
      expect(gw.cache.keys().some((k) => k.startsWith("products:"))).toBe(true);

      const res = await gw.call("POST", "/api/v1/products/sync", { token: adminToken });
      expect(res.body).toEqual({ detail: "Product caches cleared" });
      expect(gw.cache.keys().some((k) => k.startsWith("products:"))).toBe(false);
    });
  });

  describe("basket and orders", () => {
    let productId: number;

    beforeAll(async () => {
      const res = await gw.call("POST", "/api/v1/products", {
        token: adminToken,
        body: { name: "Mug", listPrice: 4 },
      });
      productId = WithId.parse(res.body).id;
    });

    it("prices basket items from the catalog", async () => {
      expect((await gw.call("GET", "/api/v1/basket", { token: userToken })).status).toBe(404);

      const res = await gw.call("POST", "/api/v1/basket/items", {
        token: userToken,
        body: { productId, quantity: 2 },
      });
      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        ownerId: String(userId),
        totalPrice: 8,
        items: [{ productId, quantity: 2, priceUnit: 4 }],
      });

      const cleared = await gw.call("DELETE", "/api/v1/basket", { token: userToken });
      expect(cleared.status).toBe(204);
    });

    it("runs an order through confirm and cancel with a fresh list each time", async () => {
      const created = await gw.call("POST", "/api/v1/orders", {
        token: userToken,
        body: {
          shippingAddress: "1 Test Street",
          lines: [{ productId, quantity: 3 }],
        },
      });
      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({ state: "draft", totalPrice: 12 });
      const { id } = WithId.parse(created.body);

      const listed = await gw.call("GET", "/api/v1/orders", { token: userToken });
      expect(listed.body).toMatchObject([{ id, state: "draft" }]);

      const confirmed = await gw.call("POST", `/api/v1/orders/${id}/confirm`, {
        token: userToken,
      });
      expect(confirmed.body).toMatchObject({ id, state: "pending" });

      const relisted = await gw.call("GET", "/api/v1/orders", { token: userToken });
      expect(relisted.body).toMatchObject([{ id, state: "pending" }]);

      const edit = await gw.call("PUT", `/api/v1/orders/${id}`, {
        token: userToken,
        body: { shippingAddress: "2 Test Street", lines: [{ productId, quantity: 1 }] },
      });
      expect(edit.status).toBe(404);

      const cancelled = await gw.call("DELETE", `/api/v1/orders/${id}`, { token: userToken });
      expect(cancelled.body).toMatchObject({ id, state: "cancelled" });

      const status = await gw.call("GET", `/api/v1/orders/${id}/status`, { token: userToken });
      expect(status.body).toMatchObject({ id, state: "cancelled" });

      const foreign = await gw.call("GET", `/api/v1/orders/${id}`, { token: adminToken });
      expect(foreign.status).toBe(404);
    });
  });

  describe("request errors", () => {
    it("answers unknown routes with a JSON 404", async () => {
      const res = await gw.call("GET", "/api/v1/nowhere");
      expect(res.status).toBe(404);
      expect(res.body).toEqual({
        error: { code: "NOT_FOUND", message: "Route not found" },
      });
    });

    it("reports validation failures with their paths", async () => {
      const res = await gw.call("POST", "/api/v1/products", {
        token: adminToken,
        body: { name: "", listPrice: -1 },
      });
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({
        error: {
          code: "VALIDATION_ERROR",
          message: "Invalid request",
          details: [{ path: "name" }, { path: "listPrice" }],
        },
      });
    });

    it("rejects a non-numeric id", async () => {
      expect((await gw.call("GET", "/api/v1/products/abc")).status).toBe(400);
    });
  });
});

describe("gateway over HTTP (federated mode)", () => {
  let gw: TestGateway;
  const records: Record<number, ExternalUserInfo> = {
    1: { id: 1, login: "eve", name: "Eve" },
    7: { id: 7, login: "bob", name: "Bob", email: "bob@example.test" },
    8: { id: 8, login: "admin", name: "Boss" },
  };
  const identity: IdentityProvider = {
    authenticate: vi.fn(async (login: string, password: string) => {
      const found = Object.values(records).find((r) => r.login === login);
      return found && password === "right-password" ? found.id : null;
    }),
    getUserInfo: vi.fn(async (id: number) => records[id] ?? null),
  };

  beforeAll(async () => {
    gw = await startGateway(
      {
        AUTH_MODE: "federated",
        ERP_URL: "http://erp.example.test",
        ERP_DB: "shop",
        ERP_USERNAME: "service",
        ERP_PASSWORD: "test-secret",
        ADMIN_LOGINS: "admin",
      },
      { identity },
    );
  });

  afterAll(async () => {
    await gw.stop();
  });

  const erpLogin = async (login: string) => {
    const res = await gw.call("POST", "/api/v1/auth/login", {
      form: { username: login, password: "right-password" },
    });
    return TokenResponse.parse(res.body);
  };

  it("issues tokens carrying the ERP id", async () => {
    const tokens = await erpLogin("bob");
    expect(tokens.external_id).toBe(7);
    const me = await gw.call("GET", "/api/v1/auth/me", { token: tokens.access_token });
    expect(me.body).toEqual({
      id: "7",
      source: "external",
      email: "bob@example.test",
      name: "Bob",
      login: "bob",
      isActive: true,
      isElevated: false,
    });
  });

  it("does not offer local registration", async () => {
    const res = await gw.call("POST", "/api/v1/auth/register", {
      body: { email: "x@example.test", name: "X", password: "right-password" },
    });
    expect(res.status).toBe(404);
  });

  it("does not let an ERP user reach the local row with the same id", async () => {
    const { access_token } = await erpLogin("eve");
    const res = await gw.call("PUT", "/api/v1/users/1", {
      token: access_token,
      body: { email: "eve@example.test", password: "other-password" },
    });
    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      error: { code: "NOT_FOUND", message: "Route not found" },
    });
    expect(
      (await gw.call("POST", "/api/v1/users/password-reset", {
        body: { email: ADMIN.email },
      })).status,
    ).toBe(404);

    expect(await gw.gateway.store.users.findById(1)).toMatchObject({
      email: ADMIN.email,
      isActive: true,
      isSuperuser: true,
    });
  });

  it("elevates the configured admin login", async () => {
    const { access_token } = await erpLogin("admin");
    const res = await gw.call("POST", "/api/v1/vendors", {
      token: access_token,
      body: { name: "Federated Vendor" },
    });
    expect(res.status).toBe(201);
  });

  it("answers 503 when the ERP is unreachable", async () => {
    const { access_token } = await erpLogin("bob");
    vi.mocked(identity.getUserInfo).mockRejectedValueOnce(new Error("ECONNREFUSED"));

    const res = await gw.call("GET", "/api/v1/auth/me", { token: access_token });
    expect(res.status).toBe(503);
    expect(res.body).toEqual({
      error: { code: "SERVICE_UNAVAILABLE", message: "Identity provider unavailable" },
    });
  });

  it("answers 401 when the ERP no longer knows the user", async () => {
    const { access_token } = await erpLogin("bob");
    vi.mocked(identity.getUserInfo).mockResolvedValueOnce(null);

    const res = await gw.call("GET", "/api/v1/auth/me", { token: access_token });
    expect(res.status).toBe(401);
    expect(res.body).toEqual({
      error: { code: "AUTH_UNAUTHORIZED", message: "principal no longer exists" },
    });
  });
});
