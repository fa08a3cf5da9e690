import type { Response } from 'express';

import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Res,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiBody,
  ApiHeader,
  ApiOkResponse,
  ApiOperation,
  ApiSecurity,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';

import type { Actor } from '../../../../common/interfaces/actor.interface';
import { AuthService } from '../../application/auth.service';
import { CurrentActor } from '../../decorators/current-actor.decorator';
import { JwtAuthGuard } from '../../guards/jwt-auth.guard';
import {
  IssueTokenDto,
  RefreshTokenDto,
  RevocationResponseDto,
  RevokeTokenDto,
  TokenPairResponseDto,
} from '../../dto/token.dto';
import { RateLimitGuard } from '../../../rate-limit/guards/rate-limit.guard';

@ApiTags('Auth')
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * POST /auth/token
   * Emisión de tokens para servicios de confianza (x-api-key)
   */
  @Post('token')
  @HttpCode(HttpStatus.OK)
  @ApiSecurity('x-api-key')
  @ApiHeader({ name: 'x-api-key', required: true })
  @ApiOperation({
    summary: 'Emitir tokens',
    description: 'Emite un par access/refresh para un usuario existente y activo',
  })
  @ApiBody({ type: IssueTokenDto })
  @ApiOkResponse({ description: 'Tokens emitidos', type: TokenPairResponseDto })
  @ApiUnauthorizedResponse({ description: 'Falta x-api-key o es inválida' })
  async issue(@Body() dto: IssueTokenDto, @Res() res: Response): Promise<Response> {
    const response = await this.authService.issueTokens(dto.subject);
    return res.status(response.statusCode).json(response);
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Renovar token de acceso',
    description: 'Intercambia un refresh token por un par nuevo; el anterior queda revocado',
  })
  @ApiBody({ type: RefreshTokenDto })
  @ApiOkResponse({ description: 'Token renovado exitosamente', type: TokenPairResponseDto })
  @ApiUnauthorizedResponse({ description: 'Token de refresco inválido, expirado o revocado' })
  async refresh(@Body() dto: RefreshTokenDto, @Res() res: Response): Promise<Response> {
    const response = await this.authService.refresh(dto.refresh_token);
    return res.status(response.statusCode).json(response);
  }

  @Post('revoke')
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth('Bearer Token')
  @UseGuards(JwtAuthGuard, RateLimitGuard)
  @ApiOperation({
    summary: 'Revocar token',
    description: 'Revoca un token propio (o cualquiera con rol admin)',
  })
  @ApiBody({ type: RevokeTokenDto })
  @ApiOkResponse({ description: 'Token revocado', type: RevocationResponseDto })
  async revoke(
    @CurrentActor() actor: Actor,
    @Body() dto: RevokeTokenDto,
    @Res() res: Response,
  ): Promise<Response> {
    const response = await this.authService.revoke(actor, dto.token, dto.reason);
    return res.status(response.statusCode).json(response);
  }
}
