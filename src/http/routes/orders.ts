import { Router } from "express";
import type { RouteContext } from "../context.js";
import { principalOf, route } from "../middleware.js";
import { OrderBody, PageQuery, parseId } from "../validation.js";
import { cacheAside, cacheKey, invalidate } from "../../cache/cacheAside.js";
import { NS, TTL, invalidations } from "../../catalog/cacheKeys.js";
import { fail } from "../../errors/error.js";
import type { OrderInput, Store } from "../../store/types.js";
import type { z } from "zod";

/** Prices every line from the catalog; client-supplied prices are never used. */
async function priceOrder(
  store: Store,
  body: z.output<typeof OrderBody>,
): Promise<OrderInput> {
  const lines: OrderInput["lines"] = [];
  for (const line of body.lines) {
    const product = await store.products.findById(line.productId);
    if (!product || !product.isActive) {
      fail("NOT_FOUND", `Product ${line.productId} not found`);
    }
    lines.push({ ...line, priceUnit: product.listPrice });
  }
  return {
    shippingAddress: body.shippingAddress,
    paymentMethod: body.paymentMethod,
    lines,
  };
}

export function ordersRouter(ctx: RouteContext): Router {
  const { store, cache, logger, guards } = ctx;
  const router = Router();
  router.use(guards.active);

  const listOrders = cacheAside(
    cache,
    (
      { ownerId, skip, limit }: { ownerId: string; skip: number; limit: number },
      s: Store,
    ) => s.orders.listByOwner(ownerId, { skip, limit }),
    {
      namespace: "orders",
      operation: "list",
      ttlSeconds: TTL.orderList,
      logger,
      key: ({ ownerId, skip, limit }) =>
        cacheKey(NS.orders(ownerId), "list", { skip, limit }),
    },
  );

  const findOwn = async (id: number, ownerId: string) =>
    (await store.orders.findForOwner(id, ownerId)) ??
    fail("NOT_FOUND", "Order not found");

  router.get(
    "/",
    route(async (req, res) => {
      const page = PageQuery.parse(req.query);
      res.json(
        await listOrders({ ownerId: principalOf(req).id(), ...page }, store),
      );
    }),
  );

  router.get(
    "/:id",
    route(async (req, res) => {
      res.json(await findOwn(parseId(req.params.id), principalOf(req).id()));
    }),
  );

  router.get(
    "/:id/status",
    route(async (req, res) => {
      const order = await findOwn(parseId(req.params.id), principalOf(req).id());
      res.json({ id: order.id, name: order.name, state: order.state });
    }),
  );

  router.post(
    "/",
    route(async (req, res) => {
      const ownerId = principalOf(req).id();
      const input = await priceOrder(store, OrderBody.parse(req.body));
      const order = await store.orders.create(ownerId, input);
      await invalidate(cache, invalidations.ordersChanged(ownerId), logger);
      res.status(201).json(order);
    }),
  );

  router.put(
    "/:id",
    route(async (req, res) => {
      const id = parseId(req.params.id);
      const ownerId = principalOf(req).id();
      const input = await priceOrder(store, OrderBody.parse(req.body));
      const order =
        (await store.orders.replace(id, ownerId, input)) ??
        fail("NOT_FOUND", "Order not found or cannot be modified");
      await invalidate(cache, invalidations.ordersChanged(ownerId), logger);
      res.json(order);
    }),
  );

  router.post(
    "/:id/confirm",
    route(async (req, res) => {
      const id = parseId(req.params.id);
      const ownerId = principalOf(req).id();
      const order =
        (await store.orders.transition(id, ownerId, ["draft"], "pending")) ??
        fail("NOT_FOUND", "Order not found or not in draft");
      await invalidate(cache, invalidations.ordersChanged(ownerId), logger);
      res.json(order);
    }),
  );

  router.delete(
    "/:id",
    route(async (req, res) => {
      const id = parseId(req.params.id);
      const ownerId = principalOf(req).id();
      const order =
        (await store.orders.transition(
          id,
          ownerId,
          ["draft", "pending"],
          "cancelled",
        )) ?? fail("NOT_FOUND", "Order not found or cannot be cancelled");
      await invalidate(cache, invalidations.ordersChanged(ownerId), logger);
      res.json(order);
    }),
  );

  return router;
}
