import { Role } from '../../../common/enums/role.enum';
import {
  RedisUserRepository,
  UserRedisClient,
} from '../repositories/redis-user.repository';
import { UserNotFoundError } from '../repositories/user.repository';

describe('RedisUserRepository', () => {
  let store: Map<string, string>;
  let repository: RedisUserRepository;

  beforeEach(() => {
    store = new Map<string, string>();
    const get = jest.fn();
    get.mockImplementation(async (key: string) => store.get(key) ?? null);
    const set = jest.fn();
    set.mockImplementation(async (key: string, value: string) => {
      store.set(key, value);
      return 'OK';
    });
    const client: UserRedisClient = { get, set };
    repository = new RedisUserRepository(client, 'test:');
  });

  it('should store users under a per-id key', async () => {
    await repository.save({
      id: 5,
      username: 'carol',
      role: Role.ADMINISTRATOR,
      tokenIssueAt: 1700000000,
    });

    expect(JSON.parse(store.get('test:user:5') ?? '{}')).toEqual({
      id: 5,
      username: 'carol',
      role: 1,
      tokenIssueAt: 1700000000,
    });
    await expect(repository.read(5)).resolves.toEqual({
      id: 5,
      username: 'carol',
      role: Role.ADMINISTRATOR,
      tokenIssueAt: 1700000000,
    });
  });

  it('should reject missing users', async () => {
    await expect(repository.read(6)).rejects.toBeInstanceOf(UserNotFoundError);
  });

  it('should reject malformed documents', async () => {
    store.set('test:user:7', JSON.stringify({ id: 7, username: 'dave' }));

    await expect(repository.read(7)).rejects.toThrow(
      'Malformed user document for user 7',
    );
  });
});
