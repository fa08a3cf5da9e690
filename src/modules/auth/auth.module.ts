import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';

import { TokensModule } from '../tokens/tokens.module';
import { UsersModule } from '../users/users.module';

import { AuthService } from './application/auth.service';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { RolesGuard } from './guards/roles.guard';
import { AuthController } from './infrastructure/controllers/auth.controller';
import { JwtStrategy } from './strategies/jwt.strategy';

/**
 * Módulo de autenticación HTTP.
 * - Endpoints de emisión, rotación y revocación de tokens
 * - Estrategia passport-jwt con comprobación de revocación por jti
 * - Guards de autenticación y roles
 */
@Module({
  imports: [PassportModule, TokensModule, UsersModule],
  controllers: [AuthController],
  providers: [AuthService, JwtStrategy, JwtAuthGuard, RolesGuard],
  exports: [PassportModule, JwtAuthGuard, RolesGuard, TokensModule],
})
export class AuthModule {}
