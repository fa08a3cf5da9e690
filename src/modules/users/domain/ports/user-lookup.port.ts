/**
 * Vista mínima de un usuario que necesita el núcleo de tokens.
 */
export interface UserSummary {
  id: string;
  username?: string;
  roles: string[];
  isActive: boolean;
}

/**
 * Puerto de consulta de usuarios. La gestión de usuarios vive fuera de
 * este servicio; aquí solo se lee.
 */
export interface IUserLookupPort {
  /**
   * @returns el usuario, o null si no existe. Lanza si el almacén no responde.
   */
  getUser(id: string): Promise<UserSummary | null>;
}
