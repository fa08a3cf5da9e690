import { Module } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { OpenChannelMembershipAdapter } from './infrastructure/adapters/open-channel-membership.adapter';

/**
 * Puerto CHANNEL_MEMBERSHIP, compartido por el gateway (`join_channel`) y el
 * polling HTTP de tópicos `channel:{id}`.
 */
@Module({
  providers: [
    {
      provide: INJECTION_TOKENS.CHANNEL_MEMBERSHIP,
      useClass: OpenChannelMembershipAdapter,
    },
  ],
  exports: [INJECTION_TOKENS.CHANNEL_MEMBERSHIP],
})
export class ChannelMembershipModule {}
