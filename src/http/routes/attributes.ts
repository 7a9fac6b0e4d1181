import { Router } from "express";
import type { RouteContext } from "../context.js";
import { route } from "../middleware.js";
import {
  AttributeBody,
  AttributePatch,
  AttributeValueBody,
  AttributeValuePatch,
  PageQuery,
  parseId,
} from "../validation.js";
import { cacheAside, cacheKey, invalidate } from "../../cache/cacheAside.js";
import { NS, TTL, invalidations } from "../../catalog/cacheKeys.js";
import { fail } from "../../errors/error.js";
import type { Page, Store } from "../../store/types.js";

export function attributesRouter(ctx: RouteContext): Router {
  const { store, cache, logger, guards } = ctx;
  const router = Router();

  const listAttributes = cacheAside(
    cache,
    (page: Page, s: Store) => s.attributes.list(page),
    {
      namespace: NS.attributes,
      operation: "list",
      ttlSeconds: TTL.attributeList,
      logger,
    },
  );

  const getAttribute = cacheAside(
    cache,
    async ({ id }: { id: number }, s: Store) =>
      (await s.attributes.findById(id)) ??
      fail("NOT_FOUND", "Attribute not found"),
    {
      namespace: NS.attribute,
      operation: "get",
      ttlSeconds: TTL.attribute,
      logger,
    },
  );

  const listValues = cacheAside(
    cache,
    async (
      { attributeId, skip, limit }: { attributeId: number; skip: number; limit: number },
      s: Store,
    ) => {
      if (!(await s.attributes.findById(attributeId))) {
        fail("NOT_FOUND", "Attribute not found");
      }
      return s.attributes.listValues(attributeId, { skip, limit });
    },
    {
      namespace: "attribute-values",
      operation: "list",
      ttlSeconds: TTL.attributeValues,
      logger,
      key: ({ attributeId, skip, limit }) =>
        cacheKey(NS.attributeValues(attributeId), "list", { skip, limit }),
    },
  );

  router.get(
    "/",
    route(async (req, res) => {
      res.json(await listAttributes(PageQuery.parse(req.query), store));
    }),
  );

  router.get(
    "/:id",
    route(async (req, res) => {
      res.json(await getAttribute({ id: parseId(req.params.id) }, store));
    }),
  );

  router.post(
    "/",
    guards.admin,
    route(async (req, res) => {
      const attribute = await store.attributes.create(AttributeBody.parse(req.body));
      await invalidate(cache, invalidations.attributeCreated(), logger);
      res.status(201).json(attribute);
    }),
  );

  router.put(
    "/:id",
    guards.admin,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      const attribute =
        (await store.attributes.update(id, AttributePatch.parse(req.body))) ??
        fail("NOT_FOUND", "Attribute not found");
      await invalidate(cache, invalidations.attributeUpdated(id), logger);
      res.json(attribute);
    }),
  );

  router.delete(
    "/:id",
    guards.admin,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      if (!(await store.attributes.delete(id))) {
        fail("NOT_FOUND", "Attribute not found");
      }
      await invalidate(cache, invalidations.attributeDeleted(id), logger);
      res.status(204).end();
    }),
  );

  router.get(
    "/:id/values",
    route(async (req, res) => {
      const page = PageQuery.parse(req.query);
      res.json(
        await listValues({ attributeId: parseId(req.params.id), ...page }, store),
      );
    }),
  );

  router.post(
    "/:id/values",
    guards.admin,
    route(async (req, res) => {
      const attributeId = parseId(req.params.id);
      const body = AttributeValueBody.parse(req.body);
      if (!(await store.attributes.findById(attributeId))) {
        fail("NOT_FOUND", "Attribute not found");
      }
      const value = await store.attributes.createValue(attributeId, body);
      await invalidate(cache, invalidations.valueWritten(attributeId), logger);
      res.status(201).json(value);
    }),
  );

  router.put(
    "/:id/values/:valueId",
    guards.admin,
    route(async (req, res) => {
      const attributeId = parseId(req.params.id);
      const valueId = parseId(req.params.valueId);
      const value =
        (await store.attributes.updateValue(
          attributeId,
          valueId,
          AttributeValuePatch.parse(req.body),
        )) ?? fail("NOT_FOUND", "Attribute value not found");
      await invalidate(cache, invalidations.valueWritten(attributeId), logger);
      res.json(value);
    }),
  );

  router.delete(
    "/:id/values/:valueId",
    guards.admin,
    route(async (req, res) => {
      const attributeId = parseId(req.params.id);
      const valueId = parseId(req.params.valueId);
      if (!(await store.attributes.deleteValue(attributeId, valueId))) {
        fail("NOT_FOUND", "Attribute value not found");
      }
      await invalidate(cache, invalidations.valueDeleted(attributeId), logger);
      res.status(204).end();
    }),
  );

  return router;
}
