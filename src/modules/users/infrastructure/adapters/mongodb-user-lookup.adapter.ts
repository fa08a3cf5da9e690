import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { User, UserDocument } from '../schemas/user.schema';
import { IUserLookupPort, UserSummary } from '../../domain/ports/user-lookup.port';
import { UserStatus } from '../../domain/enums/enums';

/**
 * Adaptador MongoDB de solo lectura para la consulta de usuarios.
 */
@Injectable()
export class MongoDbUserLookupAdapter implements IUserLookupPort {
  private readonly logger = new Logger(MongoDbUserLookupAdapter.name);

  constructor(@InjectModel(User.name) private readonly userModel: Model<UserDocument>) {}

  /**
   * Obtener usuario por ID.
   */
  async getUser(id: string): Promise<UserSummary | null> {
    try {
      const user = await this.userModel.findOne({ id }).exec();
      if (!user) {
        this.logger.debug(`User ${id} not found`);
        return null;
      }

      return {
        id: user.id,
        username: user.username,
        roles: [user.roleKey, ...(user.additionalRoleKeys ?? [])],
        isActive: user.status === UserStatus.ACTIVE,
      };
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error looking up user ${id}: ${errorMsg}`);
      throw error;
    }
  }
}
