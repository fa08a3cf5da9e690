/**
 * Resultado de una operación de persistencia.
 * Los adaptadores nunca lanzan: reportan el fallo en `error`.
 */
export interface IOperationResult<T> {
  isSuccess: boolean;
  data?: T;
  error?: string;
}
