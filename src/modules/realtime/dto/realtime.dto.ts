import { ApiProperty } from '@nestjs/swagger';
import { IsDefined } from 'class-validator';

import { ConnectionState } from '../domain/state-machines/connection.state-machine';

export class PublishRealtimeDto {
  @ApiProperty({
    description: 'Payload a difundir; los objetos se envían como JSON',
    example: { type: 'notification', message: 'hola' },
  })
  @IsDefined()
  payload!: unknown;
}

export class PublishResultDto {
  @ApiProperty()
  channel!: string;

  @ApiProperty({ description: 'Receptores alcanzados' })
  receivers!: number;
}

export class ConnectionViewDto {
  @ApiProperty()
  connection_id!: string;

  @ApiProperty()
  subject!: string;

  @ApiProperty({ type: [String] })
  roles!: string[];

  @ApiProperty()
  connected_at!: string;

  @ApiProperty()
  last_activity!: string;

  @ApiProperty({ type: [String] })
  channels!: string[];

  @ApiProperty()
  state!: ConnectionState;
}
