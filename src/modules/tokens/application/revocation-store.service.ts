import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import type { ICacheService } from '../../../common/interfaces/cache.interface';
import type { IMetricsSink } from '../../../common/interfaces/metrics-sink.interface';
import { Result } from '../../../common/types/result.type';
import { DomainError, domainError } from '../../../common/types/domain-error.type';
import type { IRevokedTokenLogPort } from '../domain/ports/revoked-token-log.port';
import {
  REVOKED_TOKEN_CACHE_PREFIX,
  RevocationOutcome,
  RevokedTokenRecord,
} from '../domain/models/revoked-token.model';

export type RevocationUnavailable = DomainError<'transient_infra'>;

export interface RevocationCheckOptions {
  /** Consultar el log durable si el jti no está en cache, aunque la configuración no lo pida */
  durable?: boolean;
}

interface CachedRevocation {
  subject: string;
  revokedAt: string;
  reason?: string;
}

/**
 * Almacén de revocaciones en dos capas.
 *
 * - Cache (Redis/memoria): camino caliente, entradas que expiran con el token
 * - Log durable (Mongo): fuente de verdad
 *
 * Escritura cache-first: la revocación es efectiva en cuanto la cache responde,
 * antes de que termine la escritura durable.
 */
@Injectable()
export class RevocationStore {
  private readonly logger = new Logger(RevocationStore.name);
  private readonly durableOnMiss: boolean;

  constructor(
    @Inject(INJECTION_TOKENS.CACHE_SERVICE) private readonly cacheService: ICacheService,
    @Inject(INJECTION_TOKENS.REVOKED_TOKEN_LOG) private readonly revokedTokenLog: IRevokedTokenLogPort,
    @Inject(INJECTION_TOKENS.METRICS_SINK) private readonly metrics: IMetricsSink,
    private readonly configService: ConfigService,
  ) {
    const flag = this.configService.get<boolean | string>('REVOCATION_CHECK_DURABLE_ON_MISS');
    this.durableOnMiss = flag === true || flag === 'true';
  }

  /**
   * Consulta si un jti está revocado.
   * Un error de cache cae al log durable; si ambos fallan el resultado es un fallo.
   */
  async isRevoked(
    jti: string,
    options: RevocationCheckOptions = {},
  ): Promise<Result<boolean, RevocationUnavailable>> {
    try {
      if (await this.cacheService.exists(this.cacheKey(jti))) {
        return Result.ok(true);
      }
      if (!this.durableOnMiss && !options.durable) {
        return Result.ok(false);
      }
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Revocation cache unavailable for jti ${jti}, using durable log: ${errorMsg}`);
      this.metrics.increment('revocation.cache_error');
    }

    return this.checkDurableLog(jti);
  }

  /**
   * Marca un jti como revocado: cache con TTL = tiempo restante del token,
   * luego upsert en el log durable.
   */
  async markRevoked(
    jti: string,
    subject: string,
    expiresAt: Date,
    reason?: string,
  ): Promise<Result<RevocationOutcome, RevocationUnavailable>> {
    const record: RevokedTokenRecord = {
      jti,
      subject,
      revokedAt: new Date(),
      expiresAt,
      reason,
    };

    const ttlSeconds = this.remainingSeconds(expiresAt);
    const cached = ttlSeconds > 0 ? await this.writeCache(record, ttlSeconds) : false;

    const durable = await this.revokedTokenLog.append(record);
    if (!durable.isSuccess) {
      this.logger.error(`Durable revocation write failed for jti ${jti}: ${durable.error}`);
      this.metrics.increment('revocation.durable_error');
    }

    if (ttlSeconds > 0 && !cached && !durable.isSuccess) {
      return Result.fail(
        domainError('transient_infra', `Revocation state for ${jti} could not be stored`),
      );
    }

    return Result.ok({
      jti,
      subject,
      expiresAt,
      reason,
      alreadyRevoked: false,
      cached,
      persisted: durable.isSuccess,
    });
  }

  private async checkDurableLog(jti: string): Promise<Result<boolean, RevocationUnavailable>> {
    const found = await this.revokedTokenLog.findByJti(jti);

    if (!found.isSuccess) {
      this.logger.error(`Revocation state for jti ${jti} is unavailable: ${found.error}`);
      this.metrics.increment('revocation.unavailable');
      return Result.fail(
        domainError('transient_infra', `Revocation state for ${jti} is unavailable`),
      );
    }

    if (!found.data) {
      return Result.ok(false);
    }

    const ttlSeconds = this.remainingSeconds(found.data.expiresAt);
    if (ttlSeconds > 0) {
      await this.writeCache(found.data, ttlSeconds);
    }
    return Result.ok(true);
  }

  private async writeCache(record: RevokedTokenRecord, ttlSeconds: number): Promise<boolean> {
    try {
      await this.cacheService.set<CachedRevocation>(
        this.cacheKey(record.jti),
        {
          subject: record.subject,
          revokedAt: record.revokedAt.toISOString(),
          reason: record.reason,
        },
        ttlSeconds,
      );
      return true;
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Revocation cache write failed for jti ${record.jti}: ${errorMsg}`);
      this.metrics.increment('revocation.cache_error');
      return false;
    }
  }

  private remainingSeconds(expiresAt: Date): number {
    return Math.max(0, Math.ceil((expiresAt.getTime() - Date.now()) / 1000));
  }

  private cacheKey(jti: string): string {
    return `${REVOKED_TOKEN_CACHE_PREFIX}${jti}`;
  }
}
