import { Router } from "express";
import type { RouteContext } from "../context.js";
import { principalOf, route } from "../middleware.js";
import { BasketItemBody, BasketItemPatch, parseId } from "../validation.js";
import { fail } from "../../errors/error.js";

export function basketRouter(ctx: RouteContext): Router {
  const { store, guards } = ctx;
  const router = Router();
  router.use(guards.active);

  router.get(
    "/",
    route(async (req, res) => {
      const basket =
        (await store.baskets.findByOwner(principalOf(req).id())) ??
        fail("NOT_FOUND", "Basket not found");
      res.json(basket);
    }),
  );

  router.post(
    "/items",
    route(async (req, res) => {
      const { productId, quantity } = BasketItemBody.parse(req.body);
      const product = await store.products.findById(productId);
      if (!product || !product.isActive) fail("NOT_FOUND", "Product not found");
      const basket = await store.baskets.addItem(principalOf(req).id(), {
        productId,
        quantity,
        priceUnit: product.listPrice,
      });
      res.status(201).json(basket);
    }),
  );

  router.put(
    "/items/:itemId",
    route(async (req, res) => {
      const itemId = parseId(req.params.itemId);
      const { quantity } = BasketItemPatch.parse(req.body);
      const basket =
        (await store.baskets.updateItem(principalOf(req).id(), itemId, quantity)) ??
        fail("NOT_FOUND", "Basket item not found");
      res.json(basket);
    }),
  );

  router.delete(
    "/items/:itemId",
    route(async (req, res) => {
      const itemId = parseId(req.params.itemId);
      const basket =
        (await store.baskets.removeItem(principalOf(req).id(), itemId)) ??
        fail("NOT_FOUND", "Basket item not found");
      res.json(basket);
    }),
  );

  router.delete(
    "/",
    route(async (req, res) => {
      await store.baskets.clear(principalOf(req).id());
      res.status(204).end();
    }),
  );

  return router;
}
