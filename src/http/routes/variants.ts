import { Router } from "express";
import type { RouteContext } from "../context.js";
import { route } from "../middleware.js";
import { VariantBody, VariantPatch, VariantQuery, parseId } from "../validation.js";
import { cacheAside, invalidate } from "../../cache/cacheAside.js";
import { NS, TTL, invalidations } from "../../catalog/cacheKeys.js";
import { assertAttributeValues, assertProduct } from "../../catalog/references.js";
import { fail } from "../../errors/error.js";
import type { Store, VariantFilter } from "../../store/types.js";

export function variantsRouter(ctx: RouteContext): Router {
  const { store, cache, logger, guards } = ctx;
  const router = Router();

  const listVariants = cacheAside(
    cache,
    (filter: VariantFilter, s: Store) => s.variants.list(filter),
    {
      namespace: NS.variants,
      operation: "list",
      ttlSeconds: TTL.variantList,
      logger,
    },
  );

  const getVariant = cacheAside(
    cache,
    async ({ id }: { id: number }, s: Store) =>
      (await s.variants.findById(id)) ?? fail("NOT_FOUND", "Variant not found"),
    { namespace: NS.variant, operation: "get", ttlSeconds: TTL.variant, logger },
  );

  router.get(
    "/",
    route(async (req, res) => {
      res.json(await listVariants(VariantQuery.parse(req.query), store));
    }),
  );

  router.get(
    "/:id",
    route(async (req, res) => {
      res.json(await getVariant({ id: parseId(req.params.id) }, store));
    }),
  );

  router.post(
    "/",
    guards.admin,
    route(async (req, res) => {
      const body = VariantBody.parse(req.body);
      await assertProduct(store, body.productId);
      await assertAttributeValues(store, body.attributeValueIds);
      const variant = await store.variants.create(body);
      await invalidate(cache, invalidations.variantCreated(variant), logger);
      res.status(201).json(variant);
    }),
  );

  router.put(
    "/:id",
    guards.admin,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      const patch = VariantPatch.parse(req.body);
      const before =
        (await store.variants.findById(id)) ??
        fail("NOT_FOUND", "Variant not found");
      if (patch.productId !== undefined) await assertProduct(store, patch.productId);
      await assertAttributeValues(store, patch.attributeValueIds ?? []);
      const after =
        (await store.variants.update(id, patch)) ??
        fail("NOT_FOUND", "Variant not found");
      await invalidate(cache, invalidations.variantUpdated(before, after), logger);
      res.json(after);
    }),
  );

  router.delete(
    "/:id",
    guards.admin,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      const before =
        (await store.variants.findById(id)) ??
        fail("NOT_FOUND", "Variant not found");
      await store.variants.delete(id);
      await invalidate(cache, invalidations.variantDeleted(before), logger);
      res.status(204).end();
    }),
  );

  return router;
}
