import { Prop } from '@nestjs/mongoose';

import { v4 as uuidv4 } from 'uuid';

/**
 * Campos comunes de los documentos: id público (uuid) y marcas de tiempo.
 */
export class AbstractSchema {
  @Prop({ type: String, required: true, unique: true, default: () => uuidv4() })
  id!: string;

  @Prop({ type: Date, default: Date.now })
  createdAt?: Date;

  @Prop({ type: Date, default: Date.now })
  updatedAt?: Date;
}
