export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS users (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  email           TEXT NOT NULL UNIQUE,
  name            TEXT NOT NULL,
  hashed_password TEXT NOT NULL,
  phone           TEXT,
  is_active       INTEGER NOT NULL DEFAULT 1,
  is_superuser    INTEGER NOT NULL DEFAULT 0,
  is_company      INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS vendors (
  id        INTEGER PRIMARY KEY AUTOINCREMENT,
  name      TEXT NOT NULL,
  email     TEXT UNIQUE,
  phone     TEXT,
  city      TEXT,
  is_active INTEGER NOT NULL DEFAULT 1
);

CREATE TABLE IF NOT EXISTS categories (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  name        TEXT NOT NULL,
  description TEXT,
  parent_id   INTEGER REFERENCES categories(id) ON DELETE SET NULL,
  vendor_id   INTEGER REFERENCES vendors(id) ON DELETE SET NULL
);

CREATE TABLE IF NOT EXISTS products (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  name        TEXT NOT NULL,
  description TEXT,
  list_price  REAL NOT NULL DEFAULT 0,
  vendor_id   INTEGER REFERENCES vendors(id) ON DELETE SET NULL,
  is_active   INTEGER NOT NULL DEFAULT 1,
  image_url   TEXT,
  tags        TEXT,
  barcode     TEXT
);
CREATE INDEX IF NOT EXISTS idx_products_name ON products(name);

CREATE TABLE IF NOT EXISTS product_category (
  product_id  INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
  category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
  PRIMARY KEY (product_id, category_id)
);

CREATE TABLE IF NOT EXISTS product_attributes (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  name         TEXT NOT NULL,
  display_type TEXT NOT NULL DEFAULT 'radio',
  is_custom    INTEGER NOT NULL DEFAULT 0,
  sequence     INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS product_attribute_values (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  attribute_id INTEGER NOT NULL REFERENCES product_attributes(id) ON DELETE CASCADE,
  name         TEXT NOT NULL,
  sequence     INTEGER NOT NULL DEFAULT 0,
  is_custom    INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_attribute_values_attribute ON product_attribute_values(attribute_id);

CREATE TABLE IF NOT EXISTS product_variants (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  product_id  INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
  sku         TEXT NOT NULL UNIQUE,
  price       REAL NOT NULL,
  barcode     TEXT,
  price_extra REAL NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_variants_product ON product_variants(product_id);

CREATE TABLE IF NOT EXISTS variant_attribute_value (
  variant_id INTEGER NOT NULL REFERENCES product_variants(id) ON DELETE CASCADE,
  value_id   INTEGER NOT NULL REFERENCES product_attribute_values(id) ON DELETE CASCADE,
  PRIMARY KEY (variant_id, value_id)
);

CREATE TABLE IF NOT EXISTS baskets (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  owner_id    TEXT NOT NULL UNIQUE,
  total_price REAL NOT NULL DEFAULT 0,
  updated_at  TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS basket_items (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  basket_id  INTEGER NOT NULL REFERENCES baskets(id) ON DELETE CASCADE,
  product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
  quantity   INTEGER NOT NULL,
  price_unit REAL NOT NULL
);

CREATE TABLE IF NOT EXISTS orders (
  id               INTEGER PRIMARY KEY AUTOINCREMENT,
  name             TEXT UNIQUE,
  owner_id         TEXT NOT NULL,
  state            TEXT NOT NULL DEFAULT 'draft',
  order_date       TEXT NOT NULL,
  total_price      REAL NOT NULL DEFAULT 0,
  shipping_address TEXT NOT NULL,
  payment_method   TEXT
);
CREATE INDEX IF NOT EXISTS idx_orders_owner ON orders(owner_id, order_date);

CREATE TABLE IF NOT EXISTS order_lines (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  order_id   INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
  product_id INTEGER NOT NULL,
  quantity   REAL NOT NULL,
  price_unit REAL NOT NULL,
  subtotal   REAL NOT NULL
);
`;
