import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { Role } from '../../../common/enums/role.enum';
import { InMemoryUserRepository } from '../repositories/in-memory-user.repository';
import {
  USER_REPOSITORY,
  UserNotFoundError,
} from '../repositories/user.repository';
import { UsersService } from '../users.service';

describe('UsersService', () => {
  const NOW = Date.UTC(2026, 0, 1);
  let service: UsersService;
  let userRepository: InMemoryUserRepository;

  beforeEach(async () => {
    jest.spyOn(Date, 'now').mockReturnValue(NOW);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    userRepository = new InMemoryUserRepository([
      { id: 3, username: 'bob', role: Role.STANDARD, tokenIssueAt: 0 },
    ]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: USER_REPOSITORY, useValue: userRepository },
      ],
    }).compile();

    service = module.get<UsersService>(UsersService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('invalidateTokens', () => {
    it('should move the token issue watermark to now', async () => {
      const updated = await service.invalidateTokens(3);

      expect(updated.tokenIssueAt).toBe(NOW / 1000);
      await expect(userRepository.read(3)).resolves.toEqual({
        id: 3,
        username: 'bob',
        role: Role.STANDARD,
        tokenIssueAt: NOW / 1000,
      });
    });

    it('should fail for unknown users', async () => {
      await expect(service.invalidateTokens(99)).rejects.toBeInstanceOf(
        UserNotFoundError,
      );
    });
  });
});
