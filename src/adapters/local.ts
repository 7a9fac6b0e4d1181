import type {
  CredentialChecker,
  PasswordHasher,
  PrincipalResolver,
} from "./types.js";
import type { UserRepository } from "../store/types.js";
import { LocalPrincipal } from "../principal/principal.js";

/**
 * Email + password against the users table. A missing user still costs one
 * hash comparison so response timing does not reveal which emails exist.
 */
export class StoreCredentialChecker implements CredentialChecker {
  private dummyHash?: Promise<string>;

  constructor(
    private readonly users: UserRepository,
    private readonly hasher: PasswordHasher,
  ) {}

  private getDummyHash() {
    if (!this.dummyHash) this.dummyHash = this.hasher.hash("timing-equalizer");
    return this.dummyHash;
  }

  async checkUserNamePassword(login: string, password: string) {
    const user = await this.users.findByEmail(login);
    if (!user) {
      await this.hasher.verify(password, await this.getDummyHash());
      return { ok: false as const, reason: "USER_NOT_FOUND" as const };
    }
    if (!(await this.hasher.verify(password, user.hashedPassword))) {
      return { ok: false as const, reason: "INVALID_CREDENTIALS" as const };
    }
    if (!user.isActive) {
      return { ok: false as const, reason: "USER_DISABLED" as const };
    }
    return { ok: true as const, userId: String(user.id) };
  }
}

export class StorePrincipalResolver implements PrincipalResolver {
  constructor(private readonly users: UserRepository) {}

  async resolve(principalId: string) {
    const id = Number(principalId);
    if (!Number.isSafeInteger(id)) return null;
    const user = await this.users.findById(id);
    return user ? new LocalPrincipal(user) : null;
  }
}
