import express from "express";
import type { Express } from "express";
import type { AppDeps, RouteContext } from "./context.js";
import {
  authenticate,
  cors,
  errorHandler,
  notFound,
} from "./middleware.js";
import { requireActive, requireElevated } from "../auth/policy.js";
import { authRouter } from "./routes/auth.js";
import { usersRouter } from "./routes/users.js";
import { vendorsRouter } from "./routes/vendors.js";
import { categoriesRouter } from "./routes/categories.js";
import { productsRouter } from "./routes/products.js";
import { attributesRouter } from "./routes/attributes.js";
import { variantsRouter } from "./routes/variants.js";
import { basketRouter } from "./routes/basket.js";
import { ordersRouter } from "./routes/orders.js";

export function createApp(deps: AppDeps): Express {
  const ctx: RouteContext = {
    ...deps,
    guards: {
      user: authenticate(deps.auth),
      active: authenticate(deps.auth, requireActive),
      admin: authenticate(deps.auth, requireActive, requireElevated),
    },
  };

  const app = express();
  app.disable("x-powered-by");
  app.use(cors(deps.corsOrigins));
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.get("/", (_req, res) => {
    res.json({ message: "Storefront gateway", docs: deps.apiPrefix });
  });
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", authMode: deps.auth.mode });
  });

  const api = express.Router();
  api.use("/auth", authRouter(ctx));
  // the users table backs local accounts only
  if (deps.auth.mode === "local") api.use("/users", usersRouter(ctx));
  api.use("/vendors", vendorsRouter(ctx));
  api.use("/categories", categoriesRouter(ctx));
  api.use("/products", productsRouter(ctx));
  api.use("/attributes", attributesRouter(ctx));
  api.use("/variants", variantsRouter(ctx));
  api.use("/basket", basketRouter(ctx));
  api.use("/orders", ordersRouter(ctx));
  app.use(deps.apiPrefix, api);

  app.use(notFound);
  app.use(errorHandler(deps.logger));
  return app;
}
