import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';

import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';
import { UserStatus } from '../../domain/enums/enums';

export type UserDocument = HydratedDocument<User>;

/**
 * Proyección de lectura de la colección `users`, mantenida por el
 * servicio de gestión de cuentas.
 */
@Schema({ timestamps: true, collection: 'users' })
export class User extends AbstractSchema {
  @Prop({ type: String, trim: true })
  username?: string;

  @Prop({ type: String, required: true })
  roleKey!: string;

  @Prop({ type: [String], default: [] })
  additionalRoleKeys?: string[];

  @Prop({
    required: true,
    type: String,
    enum: Object.values(UserStatus),
    default: UserStatus.ACTIVE,
  })
  status!: UserStatus;
}

export const UserSchema = SchemaFactory.createForClass(User);
