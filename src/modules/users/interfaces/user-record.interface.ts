import { Role } from '../../../common/enums/role.enum';

export interface UserRecord {
  id: number;
  username: string;
  role: Role;
  /** Unix seconds; tokens issued before this instant are rejected */
  tokenIssueAt: number;
}
