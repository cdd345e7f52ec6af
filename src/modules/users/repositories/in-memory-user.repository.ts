import { UserRecord } from '../interfaces/user-record.interface';
import { UserNotFoundError, UserRepository } from './user.repository';

export class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<number, UserRecord>();

  constructor(initial: UserRecord[] = []) {
    for (const user of initial) {
      this.users.set(user.id, { ...user });
    }
  }

  async read(id: number): Promise<UserRecord> {
    const user = this.users.get(id);
    if (!user) {
      throw new UserNotFoundError(id);
    }
    return { ...user };
  }

  async save(user: UserRecord): Promise<void> {
    this.users.set(user.id, { ...user });
  }
}
