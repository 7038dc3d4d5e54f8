/**
 * Account Service
 * Administrative user removal
 */

import { Logger, ValidationError } from '../types';

export interface UserDirectory {
  /** Rejects with NotFoundError when the user does not exist */
  deleteUser(userId: string): Promise<void>;
}

export class AccountService {
  private logger: Logger;

  constructor(
    private directory: UserDirectory,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'account-service' });
  }

  async deleteUser(userId: string): Promise<void> {
    const id = userId.trim();
    if (!id) {
      throw new ValidationError('user_id is required');
    }

    await this.directory.deleteUser(id);
    this.logger.info('User deleted', { userId: id });
  }
}
