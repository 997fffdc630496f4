/** Source of the ChromeData account credentials. Owned by the caller. */
export interface IAuthProvider {
  getAccountNumber(): string;
  getAccountSecret(): string;
}
