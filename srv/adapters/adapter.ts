import type { IAuthProvider } from "./interfaces/auth-provider.interface";

/** Binds a credential source to the requests built from it. */
export class Adapter {
  constructor(private readonly auth: IAuthProvider) {}

  getAuth(): IAuthProvider {
    return this.auth;
  }
}
