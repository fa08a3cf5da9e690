import { Inject, Injectable, Logger } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import type { IPubSubPort } from '../../../common/interfaces/pubsub.interface';
import { roleChannel, userChannel } from '../domain/models/realtime-channels';
import { ControlFrame, frames } from '../domain/models/realtime-message.model';

/**
 * Publicación de fan-out hacia los canales realtime.
 * Los payloads que no son texto se serializan a JSON.
 */
@Injectable()
export class RealtimePublisher {
  private readonly logger = new Logger(RealtimePublisher.name);

  constructor(@Inject(INJECTION_TOKENS.PUBSUB) private readonly pubsub: IPubSubPort) {}

  /**
   * @returns número de receptores alcanzados
   */
  async publishToUser(subject: string, payload: unknown): Promise<number> {
    return this.publish(userChannel(subject), payload);
  }

  async publishToRole(role: string, payload: unknown): Promise<number> {
    return this.publish(roleChannel(role), payload);
  }

  async publishControl(subject: string, frame: ControlFrame): Promise<number> {
    return this.pubsub.publish(userChannel(subject), frames.control(frame));
  }

  private async publish(channel: string, payload: unknown): Promise<number> {
    const message = typeof payload === 'string' ? payload : JSON.stringify(payload);
    const receivers = await this.pubsub.publish(channel, message);
    this.logger.debug(`Published to ${channel} (${receivers} receivers)`);
    return receivers;
  }
}
