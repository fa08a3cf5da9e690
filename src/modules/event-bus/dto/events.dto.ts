import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsDefined, IsNumber, IsOptional, Min } from 'class-validator';

export class PollEventsQueryDto {
  @ApiPropertyOptional({
    description: 'Epoch en milisegundos; solo se devuelven mensajes posteriores',
    example: 1767225600000,
  })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  since?: number;
}

export class PublishEventDto {
  @ApiProperty({ description: 'Payload JSON del evento', example: { status: 'ok' } })
  @IsDefined()
  payload!: unknown;
}

export class EventMessageDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  topic!: string;

  @ApiProperty({ description: 'Epoch en milisegundos' })
  timestamp!: number;

  @ApiProperty()
  payload!: unknown;
}
