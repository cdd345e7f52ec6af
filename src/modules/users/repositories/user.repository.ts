import { NotFoundException } from '@nestjs/common';
import { UserRecord } from '../interfaces/user-record.interface';

export const USER_REPOSITORY = 'USER_REPOSITORY';

export class UserNotFoundError extends NotFoundException {
  constructor(readonly userId: number) {
    super(`User ${userId} not found`);
  }
}

export interface UserRepository {
  /** Rejects with UserNotFoundError when the user does not exist. */
  read(id: number): Promise<UserRecord>;
  save(user: UserRecord): Promise<void>;
}
