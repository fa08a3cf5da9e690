import { IOperationResult } from '../../../../common/types/operation-result.type';
import { RevokedTokenRecord } from '../models/revoked-token.model';

/**
 * Puerto del log durable de revocaciones (fuente de verdad).
 */
export interface IRevokedTokenLogPort {
  /**
   * Inserta el registro si no existe (idempotente por jti)
   * @returns Resultado con el registro almacenado
   */
  append(record: RevokedTokenRecord): Promise<IOperationResult<RevokedTokenRecord>>;

  /**
   * Buscar un registro por jti
   * @returns Resultado con el registro, o data undefined si no existe
   */
  findByJti(jti: string): Promise<IOperationResult<RevokedTokenRecord>>;
}
