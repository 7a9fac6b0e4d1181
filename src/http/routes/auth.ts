import { Router } from "express";
import type { RouteContext } from "../context.js";
import { principalOf, route } from "../middleware.js";
import {
  LoginBody,
  LogoutBody,
  RefreshBody,
  RegisterBody,
} from "../validation.js";
import { GatewayError, fail } from "../../errors/error.js";
import { toPublicUser } from "../../store/types.js";

type IssuedTokens = {
  accessToken: string;
  refreshToken: string;
  tokenType: "bearer";
  externalId?: number;
};

function tokenResponse(t: IssuedTokens) {
  return {
    access_token: t.accessToken,
    refresh_token: t.refreshToken,
    token_type: t.tokenType,
    ...(t.externalId !== undefined ? { external_id: t.externalId } : {}),
  };
}

export function authRouter(ctx: RouteContext): Router {
  const { auth, guards } = ctx;
  const router = Router();

  router.post(
    "/login",
    route(async (req, res) => {
      const result = await auth.doAuthenticate(LoginBody.parse(req.body));
      if (!result.ok) throw new GatewayError(result.error);
      res.json(tokenResponse(result));
    }),
  );

  router.post(
    "/refresh",
    route(async (req, res) => {
      const { refresh_token } = RefreshBody.parse(req.body);
      const result = await auth.doRefresh(refresh_token);
      if (!result.ok) throw new GatewayError(result.error);
      res.json(tokenResponse(result));
    }),
  );

  router.post(
    "/logout",
    guards.user,
    route(async (req, res) => {
      const token = req.bearerToken ?? fail("AUTH_UNAUTHORIZED", "Not authenticated");
      const body = LogoutBody.parse(req.body ?? {});
      const tokens = body.refresh_token ? [token, body.refresh_token] : [token];
      for (const t of tokens) {
        const result = await auth.doLogout(t);
        if (!result.ok) throw new GatewayError(result.error);
      }
      res.json({ detail: "Successfully logged out" });
    }),
  );

  router.get(
    "/me",
    guards.user,
    route(async (req, res) => {
      res.json(principalOf(req).toProfile());
    }),
  );

  if (auth.mode === "local") {
    router.post(
      "/register",
      route(async (req, res) => {
        const body = RegisterBody.parse(req.body);
        if (await ctx.store.users.findByEmail(body.email)) {
          fail("CONFLICT", "Email already registered");
        }
        const { password, ...profile } = body;
        const user = await ctx.store.users.create({
          ...profile,
          hashedPassword: await ctx.hasher.hash(password),
          isActive: true,
          isSuperuser: false,
        });
        res.status(201).json(toPublicUser(user));
      }),
    );
  }

  return router;
}
