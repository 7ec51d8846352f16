/**
 * User account types.
 */

export interface SignupResult {
  /** Account address. */
  address: string;
  /** Generated mnemonic, returned only when none was supplied. */
  mnemonic?: string;
}

export interface UserExport {
  username: string;
  address: string;
}

export interface UserInfo {
  username: string;
  address: string;
}
