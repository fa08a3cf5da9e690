import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

/**
 * DTO: IssueTokenDto
 *
 * Solicitud de emisión de tokens para un usuario existente (servicio a servicio, x-api-key).
 */
export class IssueTokenDto {
  @ApiProperty({ description: 'ID del usuario', example: 'alice' })
  @IsString()
  @IsNotEmpty()
  subject!: string;
}

export class RefreshTokenDto {
  @ApiProperty({ description: 'Refresh token vigente' })
  @IsString()
  @IsNotEmpty()
  refresh_token!: string;
}

export class RevokeTokenDto {
  @ApiProperty({ description: 'Token a revocar (access o refresh)' })
  @IsString()
  @IsNotEmpty()
  token!: string;

  @ApiPropertyOptional({ description: 'Motivo de la revocación', example: 'logout' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  reason?: string;
}

export class TokenPairResponseDto {
  @ApiProperty()
  access_token!: string;

  @ApiProperty()
  refresh_token!: string;

  @ApiProperty({ example: 'Bearer' })
  token_type!: 'Bearer';

  @ApiProperty({ description: 'Vida del access token en segundos', example: 1800 })
  expires_in!: number;
}

export class RevocationResponseDto {
  @ApiProperty()
  jti!: string;

  @ApiProperty()
  already_revoked!: boolean;

  @ApiProperty({ description: 'Revocación registrada en el log durable' })
  persisted!: boolean;
}
