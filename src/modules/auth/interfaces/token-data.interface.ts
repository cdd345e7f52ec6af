import { Role } from '../../../common/enums/role.enum';

export interface TokenData {
  id: number;
  username: string;
  role: Role;
  forceChangePassword: boolean;
}

/** Identity recovered from a verified token, together with the raw token. */
export interface TokenRecord extends TokenData {
  token: string;
}

export interface IssuedToken {
  token: string;
  /** null when the token carries no expiry */
  expiresAt: Date | null;
}
