import { Inject, Injectable, Logger } from '@nestjs/common';
import { UserRecord } from './interfaces/user-record.interface';
import { USER_REPOSITORY, UserRepository } from './repositories/user.repository';

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @Inject(USER_REPOSITORY)
    private readonly userRepository: UserRepository,
  ) {}

  /**
   * Marks every token issued to the user so far as stale. Called after a
   * password reset or a forced logout.
   */
  async invalidateTokens(userId: number): Promise<UserRecord> {
    const user = await this.userRepository.read(userId);
    const updated: UserRecord = {
      ...user,
      tokenIssueAt: Math.floor(Date.now() / 1000),
    };
    await this.userRepository.save(updated);

    this.logger.log(`Invalidated existing sessions for user ${userId}`);
    return updated;
  }
}
