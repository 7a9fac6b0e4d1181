import type { Store } from "../store/types.js";
import { fail } from "../errors/error.js";

// Foreign keys named in a write body must exist, otherwise the write is a 404.

export async function assertVendor(
  store: Store,
  vendorId: number | null | undefined,
): Promise<void> {
  if (vendorId === null || vendorId === undefined) return;
  if (!(await store.vendors.findById(vendorId))) {
    fail("NOT_FOUND", "Vendor not found");
  }
}

export async function assertCategories(
  store: Store,
  categoryIds: Iterable<number | null | undefined>,
): Promise<void> {
  for (const id of categoryIds) {
    if (id === null || id === undefined) continue;
    if (!(await store.categories.findById(id))) {
      fail("NOT_FOUND", "Category not found");
    }
  }
}

export async function assertProduct(store: Store, productId: number): Promise<void> {
  if (!(await store.products.findById(productId))) {
    fail("NOT_FOUND", "Product not found");
  }
}

export async function assertAttributeValues(
  store: Store,
  valueIds: Iterable<number>,
): Promise<void> {
  for (const id of valueIds) {
    if (!(await store.attributes.findValueById(id))) {
      fail("NOT_FOUND", "Attribute value not found");
    }
  }
}
