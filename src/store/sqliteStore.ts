import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import { GatewayError, err } from "../errors/error.js";
import { SCHEMA_SQL } from "./schema.js";
import { DISPLAY_TYPES, ORDER_STATES } from "./types.js";
import type {
  Attribute,
  AttributeRepository,
  AttributeValue,
  DisplayType,
  Basket,
  BasketItem,
  BasketRepository,
  Category,
  CategoryFilter,
  CategoryRepository,
  NewAttribute,
  NewAttributeValue,
  NewCategory,
  NewProduct,
  NewUser,
  NewVariant,
  NewVendor,
  Order,
  OrderInput,
  OrderLine,
  OrderRepository,
  OrderState,
  Page,
  Product,
  ProductFilter,
  ProductRepository,
  Store,
  UserPatch,
  UserRecord,
  UserRepository,
  Variant,
  VariantFilter,
  VariantRepository,
  Vendor,
  VendorRepository,
} from "./types.js";

type Db = BetterSqlite3.Database;
type SqlValue = string | number | null;
type Patch = Record<string, string | number | boolean | null | undefined>;

/** Pragmas applied on open. */
const PRAGMAS: Record<string, string | number> = {
  foreign_keys: 1,
  busy_timeout: 5000,
};

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 1000;

function paging(page: Page) {
  return {
    limit: Math.min(Math.max(page.limit ?? DEFAULT_LIMIT, 0), MAX_LIMIT),
    offset: Math.max(page.skip ?? 0, 0),
  };
}

function sqlValue(v: string | number | boolean | null): SqlValue {
  return typeof v === "boolean" ? (v ? 1 : 0) : v;
}

function isUniqueViolation(e: unknown): boolean {
  return (
    typeof e === "object" &&
    e !== null &&
    "code" in e &&
    (e.code === "SQLITE_CONSTRAINT_UNIQUE" ||
      e.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

function withConflict<T>(message: string, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (isUniqueViolation(e)) throw new GatewayError(err("CONFLICT", message));
    throw e;
  }
}

/**
 * UPDATE <table> SET ... for the keys of `patch` that appear in `columns`.
 * Returns false when the row does not exist.
 */
function updateRow(
  db: Db,
  table: string,
  id: number,
  columns: Record<string, string>,
  patch: Patch,
): boolean {
  const sets: string[] = [];
  const params: Record<string, SqlValue> = { id };
  for (const [key, column] of Object.entries(columns)) {
    const value = patch[key];
    if (value === undefined) continue;
    sets.push(`${column} = @${key}`);
    params[key] = sqlValue(value);
  }
  if (sets.length === 0) {
    return (
      db.prepare(`SELECT 1 FROM ${table} WHERE id = ?`).get(id) !== undefined
    );
  }
  const info = db
    .prepare(`UPDATE ${table} SET ${sets.join(", ")} WHERE id = @id`)
    .run(params);
  return info.changes > 0;
}

// ---------------------------------------------------------------------------
// users

type UserRow = {
  id: number;
  email: string;
  name: string;
  hashed_password: string;
  phone: string | null;
  is_active: number;
  is_superuser: number;
  is_company: number;
};

const USER_COLUMNS = {
  email: "email",
  name: "name",
  hashedPassword: "hashed_password",
  phone: "phone",
  isActive: "is_active",
  isSuperuser: "is_superuser",
  isCompany: "is_company",
};

function toUser(r: UserRow): UserRecord {
  return {
    id: r.id,
    email: r.email,
    name: r.name,
    hashedPassword: r.hashed_password,
    phone: r.phone,
    isActive: r.is_active === 1,
    isSuperuser: r.is_superuser === 1,
    isCompany: r.is_company === 1,
  };
}

function userRepository(db: Db): UserRepository {
  const byId = db.prepare<[number], UserRow>("SELECT * FROM users WHERE id = ?");
  const byEmail = db.prepare<[string], UserRow>(
    "SELECT * FROM users WHERE email = ? COLLATE NOCASE",
  );

  return {
    async findById(id) {
      const row = byId.get(id);
      return row ? toUser(row) : null;
    },
    async findByEmail(email) {
      const row = byEmail.get(email);
      return row ? toUser(row) : null;
    },
    async list(page) {
      const { limit, offset } = paging(page);
      return db
        .prepare<[number, number], UserRow>(
          "SELECT * FROM users ORDER BY id LIMIT ? OFFSET ?",
        )
        .all(limit, offset)
        .map(toUser);
    },
    async create(input: NewUser) {
      const info = withConflict("Email already registered", () =>
        db
          .prepare(
            `INSERT INTO users (email, name, hashed_password, phone, is_active, is_superuser, is_company)
             VALUES (@email, @name, @hashedPassword, @phone, @isActive, @isSuperuser, @isCompany)`,
          )
          .run({
            email: input.email,
            name: input.name,
            hashedPassword: input.hashedPassword,
            phone: input.phone,
            isActive: sqlValue(input.isActive),
            isSuperuser: sqlValue(input.isSuperuser),
            isCompany: sqlValue(input.isCompany),
          }),
      );
      const row = byId.get(Number(info.lastInsertRowid));
      if (!row) throw new Error("user insert did not persist");
      return toUser(row);
    },
    async update(id, patch: UserPatch) {
      const found = withConflict("Email already registered", () =>
        updateRow(db, "users", id, USER_COLUMNS, patch),
      );
      if (!found) return null;
      const row = byId.get(id);
      return row ? toUser(row) : null;
    },
    async delete(id) {
      return db.prepare("DELETE FROM users WHERE id = ?").run(id).changes > 0;
    },
  };
}

// ---------------------------------------------------------------------------
// vendors

type VendorRow = {
  id: number;
  name: string;
  email: string | null;
  phone: string | null;
  city: string | null;
  is_active: number;
};

const VENDOR_COLUMNS = {
  name: "name",
  email: "email",
  phone: "phone",
  city: "city",
  isActive: "is_active",
};

function toVendor(r: VendorRow): Vendor {
  return {
    id: r.id,
    name: r.name,
    email: r.email,
    phone: r.phone,
    city: r.city,
    isActive: r.is_active === 1,
  };
}

function vendorRepository(db: Db): VendorRepository {
  const byId = db.prepare<[number], VendorRow>(
    "SELECT * FROM vendors WHERE id = ?",
  );
  return {
    async findById(id) {
      const row = byId.get(id);
      return row ? toVendor(row) : null;
    },
    async list(page) {
      const { limit, offset } = paging(page);
      return db
        .prepare<[number, number], VendorRow>(
          "SELECT * FROM vendors ORDER BY id LIMIT ? OFFSET ?",
        )
        .all(limit, offset)
        .map(toVendor);
    },
    async create(input: NewVendor) {
      const info = withConflict("Vendor email already registered", () =>
        db
          .prepare(
            `INSERT INTO vendors (name, email, phone, city, is_active)
             VALUES (@name, @email, @phone, @city, @isActive)`,
          )
          .run({ ...input, isActive: sqlValue(input.isActive) }),
      );
      const row = byId.get(Number(info.lastInsertRowid));
      if (!row) throw new Error("vendor insert did not persist");
      return toVendor(row);
    },
    async update(id, patch) {
      const found = withConflict("Vendor email already registered", () =>
        updateRow(db, "vendors", id, VENDOR_COLUMNS, patch),
      );
      if (!found) return null;
      const row = byId.get(id);
      return row ? toVendor(row) : null;
    },
    async delete(id) {
      return db.prepare("DELETE FROM vendors WHERE id = ?").run(id).changes > 0;
    },
  };
}

// ---------------------------------------------------------------------------
// categories

type CategoryRow = {
  id: number;
  name: string;
  description: string | null;
  parent_id: number | null;
  vendor_id: number | null;
};

const CATEGORY_COLUMNS = {
  name: "name",
  description: "description",
  parentId: "parent_id",
  vendorId: "vendor_id",
};

function toCategory(r: CategoryRow): Category {
  return {
    id: r.id,
    name: r.name,
    description: r.description,
    parentId: r.parent_id,
    vendorId: r.vendor_id,
  };
}

function categoryRepository(db: Db): CategoryRepository {
  const byId = db.prepare<[number], CategoryRow>(
    "SELECT * FROM categories WHERE id = ?",
  );
  return {
    async findById(id) {
      const row = byId.get(id);
      return row ? toCategory(row) : null;
    },
    async list(filter: CategoryFilter) {
      const { limit, offset } = paging(filter);
      const where: string[] = [];
      const params: Record<string, SqlValue> = { limit, offset };
      if (filter.vendorId !== undefined) {
        where.push("vendor_id = @vendorId");
        params.vendorId = filter.vendorId;
      }
      if (filter.parentId !== undefined) {
        where.push("parent_id = @parentId");
        params.parentId = filter.parentId;
      }
      const clause = where.length ? `WHERE ${where.join(" AND ")}` : "";
      return db
        .prepare<Record<string, SqlValue>, CategoryRow>(
          `SELECT * FROM categories ${clause} ORDER BY id LIMIT @limit OFFSET @offset`,
        )
        .all(params)
        .map(toCategory);
    },
    async create(input: NewCategory) {
      const info = db
        .prepare(
          `INSERT INTO categories (name, description, parent_id, vendor_id)
           VALUES (@name, @description, @parentId, @vendorId)`,
        )
        .run(input);
      const row = byId.get(Number(info.lastInsertRowid));
      if (!row) throw new Error("category insert did not persist");
      return toCategory(row);
    },
    async update(id, patch) {
      if (!updateRow(db, "categories", id, CATEGORY_COLUMNS, patch)) return null;
      const row = byId.get(id);
      return row ? toCategory(row) : null;
    },
    async delete(id) {
      return (
        db.prepare("DELETE FROM categories WHERE id = ?").run(id).changes > 0
      );
    },
  };
}

// ---------------------------------------------------------------------------
// products

type ProductRow = {
  id: number;
  name: string;
  description: string | null;
  list_price: number;
  vendor_id: number | null;
  is_active: number;
  image_url: string | null;
  tags: string | null;
  barcode: string | null;
};

const PRODUCT_COLUMNS = {
  name: "name",
  description: "description",
  listPrice: "list_price",
  vendorId: "vendor_id",
  isActive: "is_active",
  imageUrl: "image_url",
  tags: "tags",
  barcode: "barcode",
};

const PRODUCT_ORDER: Record<NonNullable<ProductFilter["sortBy"]>, string> = {
  price_asc: "list_price ASC, id ASC",
  price_desc: "list_price DESC, id ASC",
  name_asc: "name ASC, id ASC",
  name_desc: "name DESC, id ASC",
};

function escapeLike(s: string): string {
  return s.replace(/[\\%_]/g, "\\$&");
}

const RECOMPUTE_BASKET_SQL = `UPDATE baskets
    SET total_price = (SELECT COALESCE(SUM(price_unit * quantity), 0) FROM basket_items WHERE basket_id = @id),
        updated_at = @at
  WHERE id = @id`;

function productRepository(db: Db, now: () => Date): ProductRepository {
  const byId = db.prepare<[number], ProductRow>(
    "SELECT * FROM products WHERE id = ?",
  );
  const categoriesOf = db.prepare<[number], { category_id: number }>(
    "SELECT category_id FROM product_category WHERE product_id = ? ORDER BY category_id",
  );
  const linkCategory = db.prepare(
    "INSERT OR IGNORE INTO product_category (product_id, category_id) VALUES (?, ?)",
  );
  const unlinkAll = db.prepare(
    "DELETE FROM product_category WHERE product_id = ?",
  );

  const toProduct = (r: ProductRow): Product => ({
    id: r.id,
    name: r.name,
    description: r.description,
    listPrice: r.list_price,
    vendorId: r.vendor_id,
    isActive: r.is_active === 1,
    imageUrl: r.image_url,
    tags: r.tags,
    barcode: r.barcode,
    categoryIds: categoriesOf.all(r.id).map((c) => c.category_id),
  });

  const setCategories = (productId: number, categoryIds: number[]) => {
    unlinkAll.run(productId);
    for (const c of categoryIds) linkCategory.run(productId, c);
  };

  const insert = db.transaction((input: NewProduct) => {
    const { categoryIds, ...fields } = input;
    const info = db
      .prepare(
        `INSERT INTO products (name, description, list_price, vendor_id, is_active, image_url, tags, barcode)
         VALUES (@name, @description, @listPrice, @vendorId, @isActive, @imageUrl, @tags, @barcode)`,
      )
      .run({ ...fields, isActive: sqlValue(fields.isActive) });
    const id = Number(info.lastInsertRowid);
    setCategories(id, categoryIds);
    return id;
  });

  const basketsHolding = db.prepare<[number], { basket_id: number }>(
    "SELECT DISTINCT basket_id FROM basket_items WHERE product_id = ?",
  );
  const recompute = db.prepare(RECOMPUTE_BASKET_SQL);

  // basket items go with the product by cascade; their baskets' totals must follow
  const deleteTx = db.transaction((id: number) => {
    const baskets = basketsHolding.all(id);
    if (db.prepare("DELETE FROM products WHERE id = ?").run(id).changes === 0) {
      return false;
    }
    const at = now().toISOString();
    for (const b of baskets) recompute.run({ id: b.basket_id, at });
    return true;
  });

  const patchTx = db.transaction((id: number, patch: Partial<NewProduct>) => {
    const { categoryIds, ...fields } = patch;
    if (!updateRow(db, "products", id, PRODUCT_COLUMNS, fields)) return false;
    if (categoryIds) setCategories(id, categoryIds);
    return true;
  });

  return {
    async findById(id) {
      const row = byId.get(id);
      return row ? toProduct(row) : null;
    },
    async list(filter) {
      const { limit, offset } = paging(filter);
      const where: string[] = [];
      const params: Record<string, SqlValue> = { limit, offset };
      if (filter.categoryId !== undefined) {
        where.push(
          "id IN (SELECT product_id FROM product_category WHERE category_id = @categoryId)",
        );
        params.categoryId = filter.categoryId;
      }
      if (filter.vendorId !== undefined) {
        where.push("vendor_id = @vendorId");
        params.vendorId = filter.vendorId;
      }
      if (filter.search) {
        where.push(
          "(name LIKE @search ESCAPE '\\' OR description LIKE @search ESCAPE '\\' OR tags LIKE @search ESCAPE '\\')",
        );
        params.search = `%${escapeLike(filter.search)}%`;
      }
      if (filter.tags) {
        where.push("tags LIKE @tags ESCAPE '\\'");
        params.tags = `%${escapeLike(filter.tags)}%`;
      }
      if (filter.minPrice !== undefined) {
        where.push("list_price >= @minPrice");
        params.minPrice = filter.minPrice;
      }
      if (filter.maxPrice !== undefined) {
        where.push("list_price <= @maxPrice");
        params.maxPrice = filter.maxPrice;
      }
      const clause = where.length ? `WHERE ${where.join(" AND ")}` : "";
      const order = filter.sortBy ? PRODUCT_ORDER[filter.sortBy] : "id ASC";
      return db
        .prepare<Record<string, SqlValue>, ProductRow>(
          `SELECT * FROM products ${clause} ORDER BY ${order} LIMIT @limit OFFSET @offset`,
        )
        .all(params)
        .map(toProduct);
    },
    async create(input) {
      const row = byId.get(insert(input));
      if (!row) throw new Error("product insert did not persist");
      return toProduct(row);
    },
    async update(id, patch) {
      if (!patchTx(id, patch)) return null;
      const row = byId.get(id);
      return row ? toProduct(row) : null;
    },
    async delete(id) {
      return deleteTx(id);
    },
  };
}

// ---------------------------------------------------------------------------
// attributes

type AttributeRow = {
  id: number;
  name: string;
  display_type: string;
  is_custom: number;
  sequence: number;
};

type AttributeValueRow = {
  id: number;
  attribute_id: number;
  name: string;
  sequence: number;
  is_custom: number;
};

const ATTRIBUTE_COLUMNS = {
  name: "name",
  displayType: "display_type",
  isCustom: "is_custom",
  sequence: "sequence",
};

const ATTRIBUTE_VALUE_COLUMNS = {
  name: "name",
  sequence: "sequence",
  isCustom: "is_custom",
};

function isDisplayType(s: string): s is DisplayType {
  return DISPLAY_TYPES.some((t) => t === s);
}

function toAttribute(r: AttributeRow): Attribute {
  return {
    id: r.id,
    name: r.name,
    displayType: isDisplayType(r.display_type) ? r.display_type : "radio",
    isCustom: r.is_custom === 1,
    sequence: r.sequence,
  };
}

function toAttributeValue(r: AttributeValueRow): AttributeValue {
  return {
    id: r.id,
    attributeId: r.attribute_id,
    name: r.name,
    sequence: r.sequence,
    isCustom: r.is_custom === 1,
  };
}

function attributeRepository(db: Db): AttributeRepository {
  const byId = db.prepare<[number], AttributeRow>(
    "SELECT * FROM product_attributes WHERE id = ?",
  );
  const valueById = db.prepare<[number], AttributeValueRow>(
    "SELECT * FROM product_attribute_values WHERE id = ?",
  );
  const ownedValue = db.prepare<[number, number], AttributeValueRow>(
    "SELECT * FROM product_attribute_values WHERE id = ? AND attribute_id = ?",
  );

  return {
    async findById(id) {
      const row = byId.get(id);
      return row ? toAttribute(row) : null;
    },
    async list(page) {
      const { limit, offset } = paging(page);
      return db
        .prepare<[number, number], AttributeRow>(
          "SELECT * FROM product_attributes ORDER BY sequence, id LIMIT ? OFFSET ?",
        )
        .all(limit, offset)
        .map(toAttribute);
    },
    async create(input: NewAttribute) {
      const info = db
        .prepare(
          `INSERT INTO product_attributes (name, display_type, is_custom, sequence)
           VALUES (@name, @displayType, @isCustom, @sequence)`,
        )
        .run({ ...input, isCustom: sqlValue(input.isCustom) });
      const row = byId.get(Number(info.lastInsertRowid));
      if (!row) throw new Error("attribute insert did not persist");
      return toAttribute(row);
    },
    async update(id, patch) {
      if (!updateRow(db, "product_attributes", id, ATTRIBUTE_COLUMNS, patch)) {
        return null;
      }
      const row = byId.get(id);
      return row ? toAttribute(row) : null;
    },
    async delete(id) {
      return (
        db.prepare("DELETE FROM product_attributes WHERE id = ?").run(id)
          .changes > 0
      );
    },
    async listValues(attributeId, page) {
      const { limit, offset } = paging(page);
      return db
        .prepare<[number, number, number], AttributeValueRow>(
          `SELECT * FROM product_attribute_values WHERE attribute_id = ?
            ORDER BY sequence, id LIMIT ? OFFSET ?`,
        )
        .all(attributeId, limit, offset)
        .map(toAttributeValue);
    },
    async findValueById(valueId) {
      const row = valueById.get(valueId);
      return row ? toAttributeValue(row) : null;
    },
    async createValue(attributeId, input: NewAttributeValue) {
      const info = db
        .prepare(
          `INSERT INTO product_attribute_values (attribute_id, name, sequence, is_custom)
           VALUES (@attributeId, @name, @sequence, @isCustom)`,
        )
        .run({ ...input, attributeId, isCustom: sqlValue(input.isCustom) });
      const row = valueById.get(Number(info.lastInsertRowid));
      if (!row) throw new Error("attribute value insert did not persist");
      return toAttributeValue(row);
    },
    async updateValue(attributeId, valueId, patch) {
      if (!ownedValue.get(valueId, attributeId)) return null;
      updateRow(db, "product_attribute_values", valueId, ATTRIBUTE_VALUE_COLUMNS, patch);
      const row = valueById.get(valueId);
      return row ? toAttributeValue(row) : null;
    },
    async deleteValue(attributeId, valueId) {
      return (
        db
          .prepare(
            "DELETE FROM product_attribute_values WHERE id = ? AND attribute_id = ?",
          )
          .run(valueId, attributeId).changes > 0
      );
    },
  };
}

// ---------------------------------------------------------------------------
// variants

type VariantRow = {
  id: number;
  product_id: number;
  sku: string;
  price: number;
  barcode: string | null;
  price_extra: number;
};

const VARIANT_COLUMNS = {
  productId: "product_id",
  sku: "sku",
  price: "price",
  barcode: "barcode",
  priceExtra: "price_extra",
};

function variantRepository(db: Db): VariantRepository {
  const byId = db.prepare<[number], VariantRow>(
    "SELECT * FROM product_variants WHERE id = ?",
  );
  const valuesOf = db.prepare<[number], { value_id: number }>(
    "SELECT value_id FROM variant_attribute_value WHERE variant_id = ? ORDER BY value_id",
  );
  const linkValue = db.prepare(
    "INSERT OR IGNORE INTO variant_attribute_value (variant_id, value_id) VALUES (?, ?)",
  );
  const unlinkAll = db.prepare(
    "DELETE FROM variant_attribute_value WHERE variant_id = ?",
  );

  const toVariant = (r: VariantRow): Variant => ({
    id: r.id,
    productId: r.product_id,
    sku: r.sku,
    price: r.price,
    barcode: r.barcode,
    priceExtra: r.price_extra,
    attributeValueIds: valuesOf.all(r.id).map((v) => v.value_id),
  });

  const setValues = (variantId: number, valueIds: number[]) => {
    unlinkAll.run(variantId);
    for (const v of valueIds) linkValue.run(variantId, v);
  };

  const insert = db.transaction((input: NewVariant) => {
    const { attributeValueIds, ...fields } = input;
    const info = db
      .prepare(
        `INSERT INTO product_variants (product_id, sku, price, barcode, price_extra)
         VALUES (@productId, @sku, @price, @barcode, @priceExtra)`,
      )
      .run(fields);
    const id = Number(info.lastInsertRowid);
    setValues(id, attributeValueIds);
    return id;
  });

  const patchTx = db.transaction((id: number, patch: Partial<NewVariant>) => {
    const { attributeValueIds, ...fields } = patch;
    if (!updateRow(db, "product_variants", id, VARIANT_COLUMNS, fields)) return false;
    if (attributeValueIds) setValues(id, attributeValueIds);
    return true;
  });

  return {
    async findById(id) {
      const row = byId.get(id);
      return row ? toVariant(row) : null;
    },
    async list(filter: VariantFilter) {
      const { limit, offset } = paging(filter);
      const rows =
        filter.productId === undefined
          ? db
              .prepare<[number, number], VariantRow>(
                "SELECT * FROM product_variants ORDER BY id LIMIT ? OFFSET ?",
              )
              .all(limit, offset)
          : db
              .prepare<[number, number, number], VariantRow>(
                "SELECT * FROM product_variants WHERE product_id = ? ORDER BY id LIMIT ? OFFSET ?",
              )
              .all(filter.productId, limit, offset);
      return rows.map(toVariant);
    },
    async create(input) {
      const id = withConflict("SKU already exists", () => insert(input));
      const row = byId.get(id);
      if (!row) throw new Error("variant insert did not persist");
      return toVariant(row);
    },
    async update(id, patch) {
      if (!withConflict("SKU already exists", () => patchTx(id, patch))) return null;
      const row = byId.get(id);
      return row ? toVariant(row) : null;
    },
    async delete(id) {
      return (
        db.prepare("DELETE FROM product_variants WHERE id = ?").run(id).changes > 0
      );
    },
  };
}

// ---------------------------------------------------------------------------
// baskets

type BasketRow = {
  id: number;
  owner_id: string;
  total_price: number;
  updated_at: string;
};

type BasketItemRow = {
  id: number;
  basket_id: number;
  product_id: number;
  quantity: number;
  price_unit: number;
};

function toBasketItem(r: BasketItemRow): BasketItem {
  return {
    id: r.id,
    basketId: r.basket_id,
    productId: r.product_id,
    quantity: r.quantity,
    priceUnit: r.price_unit,
  };
}

function basketRepository(db: Db, now: () => Date): BasketRepository {
  const byOwner = db.prepare<[string], BasketRow>(
    "SELECT * FROM baskets WHERE owner_id = ?",
  );
  const itemsOf = db.prepare<[number], BasketItemRow>(
    "SELECT * FROM basket_items WHERE basket_id = ? ORDER BY id",
  );
  const insertBasket = db.prepare(
    "INSERT OR IGNORE INTO baskets (owner_id, total_price, updated_at) VALUES (?, 0, ?)",
  );
  const recompute = db.prepare(RECOMPUTE_BASKET_SQL);

  const load = (ownerId: string): Basket | null => {
    const row = byOwner.get(ownerId);
    if (!row) return null;
    return {
      id: row.id,
      ownerId: row.owner_id,
      totalPrice: row.total_price,
      updatedAt: row.updated_at,
      items: itemsOf.all(row.id).map(toBasketItem),
    };
  };

  const ensure = (ownerId: string): BasketRow => {
    insertBasket.run(ownerId, now().toISOString());
    const row = byOwner.get(ownerId);
    if (!row) throw new Error("basket insert did not persist");
    return row;
  };

  const touch = (basketId: number) =>
    recompute.run({ id: basketId, at: now().toISOString() });

  const addTx = db.transaction(
    (
      ownerId: string,
      item: { productId: number; quantity: number; priceUnit: number },
    ) => {
      const basket = ensure(ownerId);
      const existing = db
        .prepare<[number, number], BasketItemRow>(
          "SELECT * FROM basket_items WHERE basket_id = ? AND product_id = ?",
        )
        .get(basket.id, item.productId);
      if (existing) {
        db.prepare(
          "UPDATE basket_items SET quantity = quantity + ?, price_unit = ? WHERE id = ?",
        ).run(item.quantity, item.priceUnit, existing.id);
      } else {
        db.prepare(
          "INSERT INTO basket_items (basket_id, product_id, quantity, price_unit) VALUES (?, ?, ?, ?)",
        ).run(basket.id, item.productId, item.quantity, item.priceUnit);
      }
      touch(basket.id);
    },
  );

  const mutateItemTx = db.transaction(
    (ownerId: string, itemId: number, quantity: number | null) => {
      const basket = byOwner.get(ownerId);
      if (!basket) return false;
      const info =
        quantity === null
          ? db
              .prepare("DELETE FROM basket_items WHERE id = ? AND basket_id = ?")
              .run(itemId, basket.id)
          : db
              .prepare(
                "UPDATE basket_items SET quantity = ? WHERE id = ? AND basket_id = ?",
              )
              .run(quantity, itemId, basket.id);
      if (info.changes === 0) return false;
      touch(basket.id);
      return true;
    },
  );

  const clearTx = db.transaction((ownerId: string) => {
    const basket = byOwner.get(ownerId);
    if (!basket) return;
    db.prepare("DELETE FROM basket_items WHERE basket_id = ?").run(basket.id);
    touch(basket.id);
  });

  return {
    async findByOwner(ownerId) {
      return load(ownerId);
    },
    async getOrCreate(ownerId) {
      ensure(ownerId);
      const basket = load(ownerId);
      if (!basket) throw new Error("basket insert did not persist");
      return basket;
    },
    async addItem(ownerId, item) {
      addTx(ownerId, item);
      const basket = load(ownerId);
      if (!basket) throw new Error("basket insert did not persist");
      return basket;
    },
    async updateItem(ownerId, itemId, quantity) {
      return mutateItemTx(ownerId, itemId, quantity) ? load(ownerId) : null;
    },
    async removeItem(ownerId, itemId) {
      return mutateItemTx(ownerId, itemId, null) ? load(ownerId) : null;
    },
    async clear(ownerId) {
      clearTx(ownerId);
    },
  };
}

// ---------------------------------------------------------------------------
// orders

type OrderRow = {
  id: number;
  name: string | null;
  owner_id: string;
  state: string;
  order_date: string;
  total_price: number;
  shipping_address: string;
  payment_method: string | null;
};

type OrderLineRow = {
  id: number;
  order_id: number;
  product_id: number;
  quantity: number;
  price_unit: number;
  subtotal: number;
};

function isOrderState(s: string): s is OrderState {
  return ORDER_STATES.some((state) => state === s);
}

export function orderName(orderDate: Date, id: number): string {
  const yyyymm = `${orderDate.getUTCFullYear()}${String(orderDate.getUTCMonth() + 1).padStart(2, "0")}`;
  return `ORD/${yyyymm}/${String(id).padStart(3, "0")}`;
}

function orderRepository(db: Db, now: () => Date): OrderRepository {
  const forOwner = db.prepare<[number, string], OrderRow>(
    "SELECT * FROM orders WHERE id = ? AND owner_id = ?",
  );
  const linesOf = db.prepare<[number], OrderLineRow>(
    "SELECT * FROM order_lines WHERE order_id = ? ORDER BY id",
  );
  const insertLine = db.prepare(
    `INSERT INTO order_lines (order_id, product_id, quantity, price_unit, subtotal)
     VALUES (?, ?, ?, ?, ?)`,
  );

  const toOrder = (r: OrderRow): Order => {
    const lines: OrderLine[] = linesOf.all(r.id).map((l) => ({
      id: l.id,
      orderId: l.order_id,
      productId: l.product_id,
      quantity: l.quantity,
      priceUnit: l.price_unit,
      subtotal: l.subtotal,
    }));
    return {
      id: r.id,
      name: r.name ?? orderName(new Date(r.order_date), r.id),
      ownerId: r.owner_id,
      state: isOrderState(r.state) ? r.state : "draft",
      orderDate: r.order_date,
      totalPrice: r.total_price,
      shippingAddress: r.shipping_address,
      paymentMethod: r.payment_method,
      lines,
    };
  };

  const writeLines = (orderId: number, input: OrderInput): number => {
    let total = 0;
    for (const line of input.lines) {
      const subtotal = line.priceUnit * line.quantity;
      insertLine.run(orderId, line.productId, line.quantity, line.priceUnit, subtotal);
      total += subtotal;
    }
    return total;
  };

  const createTx = db.transaction((ownerId: string, input: OrderInput) => {
    const at = now();
    const info = db
      .prepare(
        `INSERT INTO orders (owner_id, state, order_date, shipping_address, payment_method)
         VALUES (?, 'draft', ?, ?, ?)`,
      )
      .run(ownerId, at.toISOString(), input.shippingAddress, input.paymentMethod);
    const id = Number(info.lastInsertRowid);
    const total = writeLines(id, input);
    db.prepare("UPDATE orders SET name = ?, total_price = ? WHERE id = ?").run(
      orderName(at, id),
      total,
      id,
    );
    return id;
  });

  const replaceTx = db.transaction(
    (id: number, ownerId: string, input: OrderInput) => {
      const row = forOwner.get(id, ownerId);
      if (!row || row.state !== "draft") return false;
      db.prepare("DELETE FROM order_lines WHERE order_id = ?").run(id);
      const total = writeLines(id, input);
      db.prepare(
        "UPDATE orders SET shipping_address = ?, payment_method = ?, total_price = ? WHERE id = ?",
      ).run(input.shippingAddress, input.paymentMethod, total, id);
      return true;
    },
  );

  return {
    async listByOwner(ownerId, page) {
      const { limit, offset } = paging(page);
      return db
        .prepare<[string, number, number], OrderRow>(
          "SELECT * FROM orders WHERE owner_id = ? ORDER BY order_date DESC, id DESC LIMIT ? OFFSET ?",
        )
        .all(ownerId, limit, offset)
        .map(toOrder);
    },
    async findForOwner(id, ownerId) {
      const row = forOwner.get(id, ownerId);
      return row ? toOrder(row) : null;
    },
    async create(ownerId, input) {
      const row = forOwner.get(createTx(ownerId, input), ownerId);
      if (!row) throw new Error("order insert did not persist");
      return toOrder(row);
    },
    async replace(id, ownerId, input) {
      if (!replaceTx(id, ownerId, input)) return null;
      const row = forOwner.get(id, ownerId);
      return row ? toOrder(row) : null;
    },
    async transition(id, ownerId, from, to) {
      const placeholders = from.map(() => "?").join(", ");
      const info = db
        .prepare(
          `UPDATE orders SET state = ? WHERE id = ? AND owner_id = ? AND state IN (${placeholders})`,
        )
        .run(to, id, ownerId, ...from);
      if (info.changes === 0) return null;
      const row = forOwner.get(id, ownerId);
      return row ? toOrder(row) : null;
    },
  };
}

// ---------------------------------------------------------------------------

export type SqliteStoreOptions = {
  /** File path, or ":memory:". */
  path: string;
  now?: () => Date;
};

export class SqliteStore implements Store {
  readonly users: UserRepository;
  readonly vendors: VendorRepository;
  readonly categories: CategoryRepository;
  readonly products: ProductRepository;
  readonly attributes: AttributeRepository;
  readonly variants: VariantRepository;
  readonly baskets: BasketRepository;
  readonly orders: OrderRepository;
  private db: Db;

  constructor(opts: SqliteStoreOptions) {
    const now = opts.now ?? (() => new Date());
    this.db = new Database(opts.path);
    for (const [name, value] of Object.entries(PRAGMAS)) {
      this.db.pragma(`${name} = ${value}`);
    }
    if (opts.path !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);

    this.users = userRepository(this.db);
    this.vendors = vendorRepository(this.db);
    this.categories = categoryRepository(this.db);
    this.products = productRepository(this.db, now);
    this.attributes = attributeRepository(this.db);
    this.variants = variantRepository(this.db);
    this.baskets = basketRepository(this.db, now);
    this.orders = orderRepository(this.db, now);
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
