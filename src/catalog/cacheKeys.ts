import { cacheKey } from "../cache/cacheAside.js";
import { escapeGlob } from "../cache/glob.js";

/**
 * Namespaces of every cached read, and for each write the full set of
 * patterns whose content depends on the written entity.
 */
export const NS = {
  products: "products",
  product: "product",
  categories: "categories",
  category: "category",
  categoryProducts: (categoryId: number) => `category:${categoryId}:products`,
  vendors: "vendors",
  vendor: "vendor",
  vendorProducts: (vendorId: number) => `vendor:${vendorId}:products`,
  attributes: "attributes",
  attribute: "attribute",
  attributeValues: (attributeId: number) => `attribute:${attributeId}:values`,
  variants: "variants",
  variant: "variant",
  productVariants: (productId: number) => `product:${productId}:variants`,
  orders: (ownerId: string) => `orders:${ownerId}`,
} as const;

export const TTL = {
  productList: 1800,
  product: 3600,
  categoryList: 3600,
  category: 3600,
  categoryProducts: 1800,
  vendorList: 3600,
  vendor: 3600,
  vendorProducts: 1800,
  attributeList: 3600,
  attribute: 3600,
  attributeValues: 3600,
  variantList: 1800,
  variant: 1800,
  productVariants: 1800,
  orderList: 1800,
} as const;

export const singleKey = (namespace: string, id: number) =>
  cacheKey(namespace, "get", { id });

type ProductShape = { id: number; vendorId: number | null; categoryIds: number[] };

function productDependents(states: ProductShape[]): string[] {
  const patterns = [`${NS.products}:*`];
  const categories = new Set<number>();
  const vendors = new Set<number>();
  for (const p of states) {
    patterns.push(singleKey(NS.product, p.id));
    p.categoryIds.forEach((c) => categories.add(c));
    if (p.vendorId !== null) vendors.add(p.vendorId);
  }
  for (const c of categories) patterns.push(`${NS.categoryProducts(c)}:*`);
  for (const v of vendors) patterns.push(`${NS.vendorProducts(v)}:*`);
  return patterns;
}

type VariantShape = { id: number; productId: number };

function variantDependents(states: VariantShape[]): string[] {
  const patterns = [`${NS.variants}:*`];
  for (const v of states) {
    patterns.push(singleKey(NS.variant, v.id));
    patterns.push(`${NS.productVariants(v.productId)}:*`);
  }
  return patterns;
}

// variant payloads embed attribute value ids
const everyVariantListing = [
  `${NS.variants}:*`,
  `${NS.variant}:get:*`,
  "product:*:variants:*",
];

export const invalidations = {
  productCreated: (after: ProductShape) => productDependents([after]),

  /** `before` must be read before the write so removed categories are covered. */
  productUpdated: (before: ProductShape, after: ProductShape) =>
    productDependents([before, after]),

  // variants go with the product
  productDeleted: (before: ProductShape) => [
    ...productDependents([before]),
    `${NS.variants}:*`,
    `${NS.variant}:get:*`,
    `${NS.productVariants(before.id)}:*`,
  ],

  productsSynced: () => [
    `${NS.products}:*`,
    `${NS.product}:*`,
    "category:*:products:*",
    "vendor:*:products:*",
  ],

  categoryCreated: () => [`${NS.categories}:*`],

  categoryUpdated: (id: number) => [
    `${NS.categories}:*`,
    singleKey(NS.category, id),
  ],

  // children lose their parent_id and every product payload, in any list,
  // embeds its category ids
  categoryDeleted: (id: number) => [
    `${NS.categories}:*`,
    `${NS.category}:*`,
    `${NS.categoryProducts(id)}:*`,
    `${NS.products}:*`,
    `${NS.product}:*`,
    "vendor:*:products:*",
  ],

  vendorCreated: () => [`${NS.vendors}:*`],

  vendorUpdated: (id: number) => [`${NS.vendors}:*`, singleKey(NS.vendor, id)],

  // deleting a vendor nulls vendor_id on its products and categories
  vendorDeleted: (id: number) => [
    `${NS.vendors}:*`,
    singleKey(NS.vendor, id),
    `${NS.vendorProducts(id)}:*`,
    `${NS.products}:*`,
    `${NS.product}:*`,
    `${NS.categories}:*`,
    `${NS.category}:*`,
  ],

  attributeCreated: () => [`${NS.attributes}:*`],

  attributeUpdated: (id: number) => [
    `${NS.attributes}:*`,
    singleKey(NS.attribute, id),
  ],

  attributeDeleted: (id: number) => [
    `${NS.attributes}:*`,
    singleKey(NS.attribute, id),
    `${NS.attributeValues(id)}:*`,
    ...everyVariantListing,
  ],

  valueWritten: (attributeId: number) => [`${NS.attributeValues(attributeId)}:*`],

  valueDeleted: (attributeId: number) => [
    `${NS.attributeValues(attributeId)}:*`,
    ...everyVariantListing,
  ],

  variantCreated: (after: VariantShape) => variantDependents([after]),

  /** `before` covers a variant moved to another product. */
  variantUpdated: (before: VariantShape, after: VariantShape) =>
    variantDependents([before, after]),

  variantDeleted: (before: VariantShape) => variantDependents([before]),

  ordersChanged: (ownerId: string) => [`${escapeGlob(NS.orders(ownerId))}:*`],
};
