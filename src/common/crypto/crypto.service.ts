import { Injectable } from '@nestjs/common';
import { timingSafeEqual } from 'crypto';

/**
 * Servicio centralizado para operaciones criptográficas
 * - Comparación en tiempo constante de secretos (x-api-key, CSRF)
 */
@Injectable()
export class CryptoService {
  /**
   * Comparación de strings en tiempo constante para prevenir timing attacks
   * @returns true si son iguales
   */
  constantTimeCompare(a: string, b: string): boolean {
    const left = Buffer.from(a, 'utf8');
    const right = Buffer.from(b, 'utf8');
    if (left.length !== right.length) {
      return false;
    }
    return timingSafeEqual(left, right);
  }
}
