import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsArray,
  IsEnum,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

import { EndpointStatus } from '../domain/models/endpoint.model';

export class ListEndpointsQueryDto {
  @ApiPropertyOptional({ example: 'AuthController' })
  @IsOptional()
  @IsString()
  category?: string;

  @ApiPropertyOptional({ enum: EndpointStatus })
  @IsOptional()
  @IsEnum(EndpointStatus)
  status?: EndpointStatus;

  @ApiPropertyOptional({ example: 'http' })
  @IsOptional()
  @IsString()
  tag?: string;
}

/**
 * DTO: RegisterEndpointDto
 *
 * Alta (o fusión) de un endpoint declarado por otro servicio.
 */
export class RegisterEndpointDto {
  @ApiProperty({ example: 'GET:/api/v1/reports' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  endpointId!: string;

  @ApiProperty({ example: 'Listado de informes' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ example: 'reports' })
  @IsOptional()
  @IsString()
  category?: string;

  @ApiPropertyOptional({ enum: EndpointStatus, default: EndpointStatus.STARTING })
  @IsOptional()
  @IsEnum(EndpointStatus)
  status?: EndpointStatus;

  @ApiPropertyOptional({ type: Object })
  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];
}

export class UpdateEndpointStatusDto {
  @ApiProperty({ enum: EndpointStatus })
  @IsEnum(EndpointStatus)
  status!: EndpointStatus;

  @ApiPropertyOptional({ type: Object })
  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

export class StatusTransitionDto {
  @ApiProperty({ enum: EndpointStatus })
  previousStatus!: EndpointStatus;

  @ApiProperty({ enum: EndpointStatus })
  newStatus!: EndpointStatus;

  @ApiProperty()
  timestamp!: Date;

  @ApiProperty({ type: Object })
  metadata!: Record<string, unknown>;
}

export class EndpointInfoDto {
  @ApiProperty()
  endpointId!: string;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  description!: string;

  @ApiProperty()
  category!: string;

  @ApiProperty({ enum: EndpointStatus })
  status!: EndpointStatus;

  @ApiProperty()
  lastChecked!: Date;

  @ApiProperty({ type: Object })
  metadata!: Record<string, unknown>;

  @ApiProperty({ type: [String] })
  tags!: string[];

  @ApiProperty({ type: [StatusTransitionDto] })
  history!: StatusTransitionDto[];
}
