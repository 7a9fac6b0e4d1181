import { Router } from "express";
import type { RouteContext } from "../context.js";
import { enforce, principalOf, route } from "../middleware.js";
import {
  PageQuery,
  PasswordResetConfirmBody,
  PasswordResetRequestBody,
  UserUpdateBody,
  parseId,
} from "../validation.js";
import { requireSelfOrElevated } from "../../auth/policy.js";
import { GatewayError, fail } from "../../errors/error.js";
import { toPublicUser } from "../../store/types.js";
import type { UserPatch } from "../../store/types.js";

export function usersRouter(ctx: RouteContext): Router {
  const { store, guards, hasher, passwordReset } = ctx;
  const router = Router();

  router.get(
    "/",
    guards.admin,
    route(async (req, res) => {
      const users = await store.users.list(PageQuery.parse(req.query));
      res.json(users.map(toPublicUser));
    }),
  );

  router.post(
    "/password-reset",
    route(async (req, res) => {
      const { email } = PasswordResetRequestBody.parse(req.body);
      await passwordReset.request(email);
      res
        .status(202)
        .json({ detail: "If the email is registered, a reset link has been sent" });
    }),
  );

  router.post(
    "/password-reset/confirm",
    route(async (req, res) => {
      const { token, newPassword } = PasswordResetConfirmBody.parse(req.body);
      const result = await passwordReset.confirm(token, newPassword);
      if (!result.ok) throw new GatewayError(result.error);
      res.json({ detail: "Password updated" });
    }),
  );

  router.get(
    "/:id",
    guards.active,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      enforce(requireSelfOrElevated(principalOf(req), id));
      const user =
        (await store.users.findById(id)) ?? fail("NOT_FOUND", "User not found");
      res.json(toPublicUser(user));
    }),
  );

  router.put(
    "/:id",
    guards.active,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      const principal = principalOf(req);
      enforce(requireSelfOrElevated(principal, id));
      const { password, ...fields } = UserUpdateBody.parse(req.body);
      if (fields.isActive !== undefined && !principal.isElevated()) {
        fail("AUTH_FORBIDDEN", "Not enough permissions");
      }
      const patch: UserPatch = { ...fields };
      if (password !== undefined) {
        patch.hashedPassword = await hasher.hash(password);
      }
      const user =
        (await store.users.update(id, patch)) ??
        fail("NOT_FOUND", "User not found");
      res.json(toPublicUser(user));
    }),
  );

  router.delete(
    "/:id",
    guards.admin,
    route(async (req, res) => {
      const id = parseId(req.params.id);
      if (!(await store.users.delete(id))) fail("NOT_FOUND", "User not found");
      res.status(204).end();
    }),
  );

  return router;
}
