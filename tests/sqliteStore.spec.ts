import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { SqliteStore, orderName } from "../src/store/sqliteStore.js";
import { GatewayError } from "../src/errors/error.js";
import type { NewProduct, NewUser } from "../src/store/types.js";

const FIXED = new Date("2024-03-15T10:00:00.000Z");

const newUser = (email: string): NewUser => ({
  email,
  name: "Test",
  hashedPassword: "hash",
  phone: null,
  isActive: true,
  isSuperuser: false,
  isCompany: false,
});

const newProduct = (overrides: Partial<NewProduct> = {}): NewProduct => ({
  name: "Widget",
  description: null,
  listPrice: 10,
  vendorId: null,
  isActive: true,
  imageUrl: null,
  tags: null,
  barcode: null,
  categoryIds: [],
  ...overrides,
});

let store: SqliteStore;

beforeEach(() => {
  store = new SqliteStore({ path: ":memory:", now: () => FIXED });
});

afterEach(() => {
  store.close();
});

describe("users", () => {
  it("creates, finds and patches a user", async () => {
    const created = await store.users.create(newUser("eve@example.test"));
    expect(await store.users.findByEmail("eve@example.test")).toEqual(created);

    const updated = await store.users.update(created.id, { name: "Eve", isActive: false });
    expect(updated).toMatchObject({ name: "Eve", isActive: false, phone: null });
    expect(await store.users.update(999, { name: "x" })).toBeNull();
  });

  it("maps a duplicate email to CONFLICT", async () => {
    await store.users.create(newUser("eve@example.test"));
    const attempt = store.users.create(newUser("eve@example.test"));
    await expect(attempt).rejects.toBeInstanceOf(GatewayError);
    await expect(attempt).rejects.toMatchObject({
      code: "CONFLICT",
      message: "Email already registered",
    });
  });
});

describe("products", () => {
  it("keeps category links through updates", async () => {
    const a = await store.categories.create({
      name: "A",
      description: null,
      parentId: null,
      vendorId: null,
    });
    const b = await store.categories.create({
      name: "B",
      description: null,
      parentId: a.id,
      vendorId: null,
    });
    const p = await store.products.create(newProduct({ categoryIds: [a.id] }));
    expect(p.categoryIds).toEqual([a.id]);

    const moved = await store.products.update(p.id, { categoryIds: [b.id], listPrice: 12 });
    expect(moved).toMatchObject({ categoryIds: [b.id], listPrice: 12, name: "Widget" });
    expect(await store.products.list({ categoryId: a.id })).toEqual([]);
    expect((await store.products.list({ categoryId: b.id })).map((x) => x.id)).toEqual([p.id]);
  });

  it("filters by price, search text and sorts", async () => {
    await store.products.create(newProduct({ name: "Cheap", listPrice: 2 }));
    await store.products.create(newProduct({ name: "Mid", listPrice: 20, tags: "sale" }));
    await store.products.create(newProduct({ name: "Dear", listPrice: 200 }));

    const names = async (filter: Parameters<typeof store.products.list>[0]) =>
      (await store.products.list(filter)).map((p) => p.name);

    expect(await names({ minPrice: 5, maxPrice: 100 })).toEqual(["Mid"]);
    expect(await names({ sortBy: "price_desc" })).toEqual(["Dear", "Mid", "Cheap"]);
    expect(await names({ search: "ea" })).toEqual(["Cheap", "Dear"]);
    expect(await names({ tags: "sale" })).toEqual(["Mid"]);
    expect(await names({ search: "%" })).toEqual([]);
    expect(await names({ skip: 1, limit: 1 })).toEqual(["Mid"]);
  });

  it("nulls the vendor when the vendor is deleted", async () => {
    const v = await store.vendors.create({
      name: "Acme",
      email: null,
      phone: null,
      city: null,
      isActive: true,
    });
    const p = await store.products.create(newProduct({ vendorId: v.id }));
    expect(await store.vendors.delete(v.id)).toBe(true);
    expect((await store.products.findById(p.id))?.vendorId).toBeNull();
  });
});

describe("baskets", () => {
  it("merges repeated products and recomputes the total", async () => {
    const p = await store.products.create(newProduct({ listPrice: 2.5 }));
    await store.baskets.addItem("42", { productId: p.id, quantity: 2, priceUnit: 2.5 });
    const basket = await store.baskets.addItem("42", {
      productId: p.id,
      quantity: 1,
      priceUnit: 2.5,
    });

    expect(basket.items).toHaveLength(1);
    expect(basket.items[0]?.quantity).toBe(3);
    expect(basket.totalPrice).toBe(7.5);
    expect(basket.ownerId).toBe("42");
  });

  it("only touches the owner's own items", async () => {
    const p = await store.products.create(newProduct());
    const mine = await store.baskets.addItem("1", { productId: p.id, quantity: 1, priceUnit: 10 });
    const itemId = mine.items[0]?.id ?? -1;

    expect(await store.baskets.updateItem("2", itemId, 5)).toBeNull();
    expect(await store.baskets.removeItem("2", itemId)).toBeNull();

    const updated = await store.baskets.updateItem("1", itemId, 4);
    expect(updated?.totalPrice).toBe(40);
    await store.baskets.clear("1");
    expect((await store.baskets.findByOwner("1"))?.items).toEqual([]);
  });

  it("re-totals baskets that held a deleted product", async () => {
    const gone = await store.products.create(newProduct({ listPrice: 10 }));
    const kept = await store.products.create(newProduct({ name: "Gadget", listPrice: 3 }));
    await store.baskets.addItem("1", { productId: gone.id, quantity: 2, priceUnit: 10 });
    await store.baskets.addItem("1", { productId: kept.id, quantity: 1, priceUnit: 3 });
    await store.baskets.addItem("2", { productId: gone.id, quantity: 1, priceUnit: 10 });

    expect(await store.products.delete(gone.id)).toBe(true);

    const one = await store.baskets.findByOwner("1");
    expect(one?.items.map((i) => i.productId)).toEqual([kept.id]);
    expect(one?.totalPrice).toBe(3);
    expect(await store.baskets.findByOwner("2")).toMatchObject({ items: [], totalPrice: 0 });
    expect(await store.products.delete(gone.id)).toBe(false);
  });
});

describe("attributes and variants", () => {
  async function sized() {
    const size = await store.attributes.create({
      name: "Size",
      displayType: "pills",
      isCustom: false,
      sequence: 1,
    });
    const small = await store.attributes.createValue(size.id, {
      name: "S",
      sequence: 1,
      isCustom: false,
    });
    const large = await store.attributes.createValue(size.id, {
      name: "L",
      sequence: 2,
      isCustom: false,
    });
    return { size, small, large };
  }

  it("orders values by sequence and scopes them to their attribute", async () => {
    const { size, small, large } = await sized();
    const color = await store.attributes.create({
      name: "Color",
      displayType: "color",
      isCustom: false,
      sequence: 0,
    });

    expect((await store.attributes.list({})).map((a) => a.name)).toEqual(["Color", "Size"]);
    expect(await store.attributes.updateValue(size.id, small.id, { sequence: 3 })).toMatchObject({
      id: small.id,
      attributeId: size.id,
      sequence: 3,
    });
    expect((await store.attributes.listValues(size.id, {})).map((v) => v.name)).toEqual([
      "L",
      "S",
    ]);
    expect(await store.attributes.updateValue(color.id, large.id, { name: "XL" })).toBeNull();
    expect(await store.attributes.deleteValue(color.id, large.id)).toBe(false);
  });

  it("links variants to attribute values and rejects a duplicate SKU", async () => {
    const { small, large } = await sized();
    const product = await store.products.create(newProduct());
    const variant = await store.variants.create({
      productId: product.id,
      sku: "WID-S",
      price: 10,
      barcode: null,
      priceExtra: 0,
      attributeValueIds: [small.id],
    });
    expect(variant).toMatchObject({ sku: "WID-S", attributeValueIds: [small.id] });

    const moved = await store.variants.update(variant.id, {
      attributeValueIds: [large.id],
      priceExtra: 2,
    });
    expect(moved).toMatchObject({ priceExtra: 2, attributeValueIds: [large.id] });

    const duplicate = store.variants.create({
      productId: product.id,
      sku: "WID-S",
      price: 11,
      barcode: null,
      priceExtra: 0,
      attributeValueIds: [],
    });
    await expect(duplicate).rejects.toBeInstanceOf(GatewayError);
    await expect(duplicate).rejects.toMatchObject({
      code: "CONFLICT",
      message: "SKU already exists",
    });
    expect(await store.variants.list({ productId: product.id })).toHaveLength(1);
  });

  it("cascades attribute and product deletes to variants", async () => {
    const { size, small } = await sized();
    const product = await store.products.create(newProduct());
    const variant = await store.variants.create({
      productId: product.id,
      sku: "WID-S",
      price: 10,
      barcode: "0001",
      priceExtra: 0,
      attributeValueIds: [small.id],
    });

    expect(await store.attributes.delete(size.id)).toBe(true);
    expect(await store.attributes.findValueById(small.id)).toBeNull();
    expect((await store.variants.findById(variant.id))?.attributeValueIds).toEqual([]);

    expect(await store.products.delete(product.id)).toBe(true);
    expect(await store.variants.findById(variant.id)).toBeNull();
  });
});

describe("orders", () => {
  const input = {
    shippingAddress: "1 Test Street",
    paymentMethod: null,
    lines: [
      { productId: 1, quantity: 2, priceUnit: 3 },
      { productId: 2, quantity: 1, priceUnit: 4 },
    ],
  };

  it("writes an order with its lines in one unit", async () => {
    const order = await store.orders.create("7", input);
    expect(order).toMatchObject({
      name: "ORD/202403/001",
      ownerId: "7",
      state: "draft",
      totalPrice: 10,
      orderDate: FIXED.toISOString(),
    });
    expect(order.lines.map((l) => l.subtotal)).toEqual([6, 4]);
  });

  it("hides other owners' orders", async () => {
    const order = await store.orders.create("7", input);
    expect(await store.orders.findForOwner(order.id, "8")).toBeNull();
    expect(await store.orders.listByOwner("8", {})).toEqual([]);
  });

  it("replaces only draft orders and guards transitions", async () => {
    const order = await store.orders.create("7", input);
    const replaced = await store.orders.replace(order.id, "7", {
      ...input,
      lines: [{ productId: 1, quantity: 1, priceUnit: 3 }],
    });
    expect(replaced?.totalPrice).toBe(3);

    const pending = await store.orders.transition(order.id, "7", ["draft"], "pending");
    expect(pending?.state).toBe("pending");
    expect(await store.orders.replace(order.id, "7", input)).toBeNull();
    expect(await store.orders.transition(order.id, "7", ["draft"], "pending")).toBeNull();
  });

  it("names orders by month and id", () => {
    expect(orderName(new Date("2025-11-02T00:00:00Z"), 1234)).toBe("ORD/202511/1234");
  });
});
