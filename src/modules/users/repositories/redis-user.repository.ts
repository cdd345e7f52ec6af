import { Redis as RedisClient } from 'ioredis';
import { redisKeys } from '../../../common/constants/app.constants';
import { UserRecord } from '../interfaces/user-record.interface';
import { UserNotFoundError, UserRepository } from './user.repository';

export type UserRedisClient = Pick<RedisClient, 'get' | 'set'>;

export class RedisUserRepository implements UserRepository {
  constructor(
    private readonly redis: UserRedisClient,
    private readonly keyPrefix: string,
  ) {}

  async read(id: number): Promise<UserRecord> {
    const raw = await this.redis.get(this.key(id));
    if (raw === null) {
      throw new UserNotFoundError(id);
    }
    return RedisUserRepository.fromDocument(JSON.parse(raw), id);
  }

  async save(user: UserRecord): Promise<void> {
    await this.redis.set(this.key(user.id), JSON.stringify(user));
  }

  private key(id: number): string {
    return `${this.keyPrefix}${redisKeys.USER(id)}`;
  }

  private static fromDocument(doc: unknown, id: number): UserRecord {
    if (
      doc !== null &&
      typeof doc === 'object' &&
      'id' in doc &&
      doc.id === id &&
      'username' in doc &&
      typeof doc.username === 'string' &&
      'role' in doc &&
      typeof doc.role === 'number' &&
      'tokenIssueAt' in doc &&
      typeof doc.tokenIssueAt === 'number'
    ) {
      return {
        id,
        username: doc.username,
        role: doc.role,
        tokenIssueAt: doc.tokenIssueAt,
      };
    }
    throw new Error(`Malformed user document for user ${id}`);
  }
}
