import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { MongoDbUserLookupAdapter } from './infrastructure/adapters/mongodb-user-lookup.adapter';
import { User, UserSchema } from './infrastructure/schemas/user.schema';

/**
 * Módulo de consulta de usuarios.
 *
 * La gestión de cuentas es externa; este módulo solo expone el puerto
 * USER_LOOKUP (lectura) que usan los tokens y el gateway realtime.
 */
@Module({
  imports: [MongooseModule.forFeature([{ name: User.name, schema: UserSchema }])],
  providers: [
    {
      provide: INJECTION_TOKENS.USER_LOOKUP,
      useClass: MongoDbUserLookupAdapter,
    },
  ],
  exports: [INJECTION_TOKENS.USER_LOOKUP],
})
export class UsersModule {}
