import { Router } from "express";
import type { RouteContext } from "../context.js";
import { route } from "../middleware.js";
import {
  CategoryBody,
  CategoryPatch,
  CategoryQuery,
  PageQuery,
  parseId,
} from "../validation.js";
import { cacheAside, cacheKey, invalidate } from "../../cache/cacheAside.js";
import { NS, TTL, invalidations } from "../../catalog/cacheKeys.js";
import { assertCategories, assertVendor } from "../../catalog/references.js";
import { fail } from "../../errors/error.js";
import type { CategoryFilter, Store } from "../../store/types.js";

export function categoriesRouter(ctx: RouteContext): Router {
  const { store, cache, logger, guards } = ctx;
  const router = Router();

  const listCategories = cacheAside(
    cache,
    (filter: CategoryFilter, s: Store) => s.categories.list(filter),
    {
      namespace: NS.categories,
      operation: "list",
      ttlSeconds: TTL.categoryList,
      logger,
    },
  );

  const getCategory = cacheAside(
    cache,
    async ({ id }: { id: number }, s: Store) =>
      (await s.categories.findById(id)) ??
      fail("NOT_FOUND", "Category not found"),
    {
      namespace: NS.category,
      operation: "get",
      ttlSeconds: TTL.category,
      logger,
    },
  );

  const listCategoryProducts = cacheAside(
    cache,
    async (
      { categoryId, skip, limit }: { categoryId: number; skip: number; limit: number },
      s: Store,
    ) => {
      if (!(await s.categories.findById(categoryId))) {
        fail("NOT_FOUND", "Category not found");
      }
      return s.products.list({ categoryId, skip, limit });
    },
    {
      namespace: "category-products",
      operation: "list",
      ttlSeconds: TTL.categoryProducts,
      logger,
      key: ({ categoryId, skip, limit }) =>
        cacheKey(NS.categoryProducts(categoryId), "list", { skip, limit }),
    },
  );

  router.get(
    "/",
    route(async (req, res) => {
      res.json(await listCategories(CategoryQuery.parse(req.query), store));
    }),
  );

  router.get(
    "/:id",
    route(async (req, res) => {
      res.json(await getCategory({ id: parseId(req.params.id) }, store));
    }),
  );

  router.get(
    "/:id/products",
    route(async (req, res) => {
      const page = PageQuery.parse(req.query);
      res.json(
        await listCategoryProducts(
          { categoryId: parseId(req.params.id), ...page },
          store,
        ),
      );
    }),
  );

  router.post(
    "/",
    guards.admin,
    route(async (req, res) => {
      const body = CategoryBody.parse(req.body);
      await assertVendor(store, body.vendorId);
      await assertCategories(store, [body.parentId]);
      const category = await store.categories.create(body);
      await invalidate(cache, invalidations.categoryCreated(), logger);
      res.status(201).json(category);
    }),
  );

  router.put(
    "/:id",
    guards.admin,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      const patch = CategoryPatch.parse(req.body);
      if (patch.parentId === id) {
        fail("VALIDATION_ERROR", "A category cannot be its own parent");
      }
      await assertVendor(store, patch.vendorId);
      await assertCategories(store, [patch.parentId]);
      const category =
        (await store.categories.update(id, patch)) ??
        fail("NOT_FOUND", "Category not found");
      await invalidate(cache, invalidations.categoryUpdated(id), logger);
      res.json(category);
    }),
  );

  router.delete(
    "/:id",
    guards.admin,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      if (!(await store.categories.delete(id))) {
        fail("NOT_FOUND", "Category not found");
      }
      await invalidate(cache, invalidations.categoryDeleted(id), logger);
      res.status(204).end();
    }),
  );

  return router;
}
