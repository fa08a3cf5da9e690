import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { UsersModule } from '../users/users.module';

import { RevocationStore } from './application/revocation-store.service';
import { TokenService } from './application/token.service';
import { RevokedTokenRepository } from './infrastructure/adapters/revoked-token.repository';
import { RevokedToken, RevokedTokenSchema } from './infrastructure/schemas/revoked-token.schema';

/**
 * Módulo de tokens.
 * - Emisión y validación de JWT simétricos (HS256 por defecto)
 * - Revocación por jti en dos capas (cache + log durable en Mongo)
 * - Rotación de refresh tokens
 *
 * Exports:
 * - TokenService
 * - RevocationStore
 */
@Module({
  imports: [
    UsersModule,
    MongooseModule.forFeature([{ name: RevokedToken.name, schema: RevokedTokenSchema }]),
  ],
  providers: [
    RevocationStore,
    TokenService,
    {
      provide: INJECTION_TOKENS.REVOKED_TOKEN_LOG,
      useClass: RevokedTokenRepository,
    },
  ],
  exports: [TokenService, RevocationStore],
})
export class TokensModule {}
