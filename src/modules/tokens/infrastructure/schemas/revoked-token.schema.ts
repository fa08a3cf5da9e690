import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';

export type RevokedTokenDocument = HydratedDocument<RevokedToken>;

@Schema({ timestamps: true, collection: 'revoked_tokens' })
export class RevokedToken extends AbstractSchema {
  @Prop({ type: String, required: true, unique: true, index: true })
  jti!: string;

  @Prop({ type: String, required: true, index: true })
  subject!: string;

  @Prop({ type: Date, required: true, default: Date.now })
  revokedAt!: Date;

  @Prop({
    type: Date,
    required: true,
    description: 'Expiración original del token revocado',
  })
  expiresAt!: Date;

  @Prop({ type: String, required: false })
  reason?: string;
}

export const RevokedTokenSchema = SchemaFactory.createForClass(RevokedToken);

// La retención la ejecuta Mongo: el documento desaparece cuando el token ya no puede validar
RevokedTokenSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });
