import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { IOperationResult } from '../../../../common/types/operation-result.type';
import { IRevokedTokenLogPort } from '../../domain/ports/revoked-token-log.port';
import { RevokedTokenRecord } from '../../domain/models/revoked-token.model';
import { RevokedToken, RevokedTokenDocument } from '../schemas/revoked-token.schema';

/**
 * Adaptador MongoDB del log durable de revocaciones.
 * Implementa el patrón Repository; nunca lanza, reporta el fallo en el resultado.
 */
@Injectable()
export class RevokedTokenRepository implements IRevokedTokenLogPort {
  private readonly logger = new Logger(RevokedTokenRepository.name);

  constructor(
    @InjectModel(RevokedToken.name)
    private readonly revokedTokenModel: Model<RevokedTokenDocument>,
  ) {}

  /**
   * Upsert por jti: una segunda revocación conserva el registro original
   * @param record Registro a persistir
   * @returns Resultado con el registro almacenado
   */
  async append(record: RevokedTokenRecord): Promise<IOperationResult<RevokedTokenRecord>> {
    try {
      const stored = await this.revokedTokenModel
        .findOneAndUpdate(
          { jti: record.jti },
          {
            $setOnInsert: {
              jti: record.jti,
              subject: record.subject,
              revokedAt: record.revokedAt,
              expiresAt: record.expiresAt,
              reason: record.reason,
            },
          },
          { upsert: true, new: true },
        )
        .exec();

      if (!stored) {
        return {
          isSuccess: false,
          error: `Revocation for ${record.jti} was not stored`,
        };
      }

      this.logger.debug(`Revocation persisted for jti ${record.jti}`);
      return {
        isSuccess: true,
        data: this.toRecord(stored),
      };
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error persisting revocation for jti ${record.jti}: ${errorMsg}`);
      return {
        isSuccess: false,
        error: errorMsg,
      };
    }
  }

  /**
   * Buscar revocación por jti
   * @returns Resultado con el registro (si existe)
   */
  async findByJti(jti: string): Promise<IOperationResult<RevokedTokenRecord>> {
    try {
      const found = await this.revokedTokenModel.findOne({ jti }).exec();

      return {
        isSuccess: true,
        data: found ? this.toRecord(found) : undefined,
      };
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error finding revocation for jti ${jti}: ${errorMsg}`);
      return {
        isSuccess: false,
        error: errorMsg,
      };
    }
  }

  private toRecord(document: RevokedTokenDocument): RevokedTokenRecord {
    return {
      jti: document.jti,
      subject: document.subject,
      revokedAt: document.revokedAt,
      expiresAt: document.expiresAt,
      reason: document.reason ?? undefined,
    };
  }
}
