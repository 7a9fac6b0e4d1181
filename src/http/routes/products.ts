import { Router } from "express";
import type { RouteContext } from "../context.js";
import { route } from "../middleware.js";
import {
  PageQuery,
  ProductBody,
  ProductPatch,
  ProductQuery,
  parseId,
} from "../validation.js";
import { cacheAside, cacheKey, invalidate } from "../../cache/cacheAside.js";
import { NS, TTL, invalidations } from "../../catalog/cacheKeys.js";
import { assertCategories, assertVendor } from "../../catalog/references.js";
import { fail } from "../../errors/error.js";
import type { ProductFilter, Store } from "../../store/types.js";

export function productsRouter(ctx: RouteContext): Router {
  const { store, cache, logger, guards } = ctx;
  const router = Router();

  const listProducts = cacheAside(
    cache,
    (filter: ProductFilter, s: Store) => s.products.list(filter),
    {
      namespace: NS.products,
      operation: "list",
      ttlSeconds: TTL.productList,
      logger,
    },
  );

  const getProduct = cacheAside(
    cache,
    async ({ id }: { id: number }, s: Store) =>
      (await s.products.findById(id)) ?? fail("NOT_FOUND", "Product not found"),
    { namespace: NS.product, operation: "get", ttlSeconds: TTL.product, logger },
  );

  const listProductVariants = cacheAside(
    cache,
    async (
      { productId, skip, limit }: { productId: number; skip: number; limit: number },
      s: Store,
    ) => {
      if (!(await s.products.findById(productId))) {
        fail("NOT_FOUND", "Product not found");
      }
      return s.variants.list({ productId, skip, limit });
    },
    {
      namespace: "product-variants",
      operation: "list",
      ttlSeconds: TTL.productVariants,
      logger,
      key: ({ productId, skip, limit }) =>
        cacheKey(NS.productVariants(productId), "list", { skip, limit }),
    },
  );

  router.get(
    "/",
    route(async (req, res) => {
      res.json(await listProducts(ProductQuery.parse(req.query), store));
    }),
  );

  router.post(
    "/sync",
    guards.admin,
    route(async (_req, res) => {
      await invalidate(cache, invalidations.productsSynced(), logger);
      res.json({ detail: "Product caches cleared" });
    }),
  );

  router.get(
    "/:id",
    route(async (req, res) => {
      res.json(await getProduct({ id: parseId(req.params.id) }, store));
    }),
  );

  router.get(
    "/:id/variants",
    route(async (req, res) => {
      const page = PageQuery.parse(req.query);
      res.json(
        await listProductVariants(
          { productId: parseId(req.params.id), ...page },
          store,
        ),
      );
    }),
  );

  router.post(
    "/",
    guards.admin,
    route(async (req, res) => {
      const body = ProductBody.parse(req.body);
      await assertVendor(store, body.vendorId);
      await assertCategories(store, body.categoryIds);
      const product = await store.products.create(body);
      await invalidate(cache, invalidations.productCreated(product), logger);
      res.status(201).json(product);
    }),
  );

  router.put(
    "/:id",
    guards.admin,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      const patch = ProductPatch.parse(req.body);
      const before =
        (await store.products.findById(id)) ??
        fail("NOT_FOUND", "Product not found");
      await assertVendor(store, patch.vendorId);
      await assertCategories(store, patch.categoryIds ?? []);
      const after =
        (await store.products.update(id, patch)) ??
        fail("NOT_FOUND", "Product not found");
      await invalidate(cache, invalidations.productUpdated(before, after), logger);
      res.json(after);
    }),
  );

  router.delete(
    "/:id",
    guards.admin,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      const before =
        (await store.products.findById(id)) ??
        fail("NOT_FOUND", "Product not found");
      await store.products.delete(id);
      await invalidate(cache, invalidations.productDeleted(before), logger);
      res.status(204).end();
    }),
  );

  return router;
}
