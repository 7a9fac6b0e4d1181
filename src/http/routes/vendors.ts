import { Router } from "express";
import type { RouteContext } from "../context.js";
import { route } from "../middleware.js";
import { PageQuery, VendorBody, VendorPatch, parseId } from "../validation.js";
import { cacheAside, cacheKey, invalidate } from "../../cache/cacheAside.js";
import { NS, TTL, invalidations } from "../../catalog/cacheKeys.js";
import { fail } from "../../errors/error.js";
import type { Page, Store } from "../../store/types.js";

export function vendorsRouter(ctx: RouteContext): Router {
  const { store, cache, logger, guards } = ctx;
  const router = Router();

  const listVendors = cacheAside(
    cache,
    (page: Page, s: Store) => s.vendors.list(page),
    {
      namespace: NS.vendors,
      operation: "list",
      ttlSeconds: TTL.vendorList,
      logger,
    },
  );

  const getVendor = cacheAside(
    cache,
    async ({ id }: { id: number }, s: Store) =>
      (await s.vendors.findById(id)) ?? fail("NOT_FOUND", "Vendor not found"),
    { namespace: NS.vendor, operation: "get", ttlSeconds: TTL.vendor, logger },
  );

  const listVendorProducts = cacheAside(
    cache,
    async (
      { vendorId, skip, limit }: { vendorId: number; skip: number; limit: number },
      s: Store,
    ) => {
      if (!(await s.vendors.findById(vendorId))) {
        fail("NOT_FOUND", "Vendor not found");
      }
      return s.products.list({ vendorId, skip, limit });
    },
    {
      namespace: "vendor-products",
      operation: "list",
      ttlSeconds: TTL.vendorProducts,
      logger,
      key: ({ vendorId, skip, limit }) =>
        cacheKey(NS.vendorProducts(vendorId), "list", { skip, limit }),
    },
  );

  router.get(
    "/",
    route(async (req, res) => {
      res.json(await listVendors(PageQuery.parse(req.query), store));
    }),
  );

  router.get(
    "/:id",
    route(async (req, res) => {
      res.json(await getVendor({ id: parseId(req.params.id) }, store));
    }),
  );

  router.get(
    "/:id/products",
    route(async (req, res) => {
      const page = PageQuery.parse(req.query);
      res.json(
        await listVendorProducts(
          { vendorId: parseId(req.params.id), ...page },
          store,
        ),
      );
    }),
  );

  router.post(
    "/",
    guards.admin,
    route(async (req, res) => {
      const vendor = await store.vendors.create(VendorBody.parse(req.body));
      await invalidate(cache, invalidations.vendorCreated(), logger);
      res.status(201).json(vendor);
    }),
  );

  router.put(
    "/:id",
    guards.admin,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      const vendor =
        (await store.vendors.update(id, VendorPatch.parse(req.body))) ??
        fail("NOT_FOUND", "Vendor not found");
      await invalidate(cache, invalidations.vendorUpdated(id), logger);
      res.json(vendor);
    }),
  );

  router.delete(
    "/:id",
    guards.admin,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      if (!(await store.vendors.delete(id))) {
        fail("NOT_FOUND", "Vendor not found");
      }
      await invalidate(cache, invalidations.vendorDeleted(id), logger);
      res.status(204).end();
    }),
  );

  return router;
}
