import { Controller, Get, HttpStatus, Req, Res } from '@nestjs/common';
import type { Request, Response } from 'express';
import { ApiOperation, ApiResponse as ApiDocResponse, ApiTags } from '@nestjs/swagger';

import { ApiResponse } from '../../common/types/api-response.type';
import { CSRF_COOKIE_NAME, getCookieConfig } from '../../config/cookie.config';
import { CsrfService } from './csrf.service';

@ApiTags('CSRF')
@Controller('csrf-token')
export class CsrfController {
  constructor(private readonly csrfService: CsrfService) {}

  @Get()
  @ApiOperation({ summary: 'Obtener token CSRF' })
  @ApiDocResponse({ status: 200, description: 'Token CSRF generado exitosamente' })
  async getCsrfToken(@Req() req: Request, @Res() res: Response): Promise<Response> {
    const previous: unknown = req.cookies?.[CSRF_COOKIE_NAME];
    const token =
      typeof previous === 'string' && previous
        ? await this.csrfService.rotateToken(previous)
        : await this.csrfService.generateToken();

    res.cookie(CSRF_COOKIE_NAME, token, getCookieConfig().csrf_token);

    const response = ApiResponse.ok<{ token: string }>(
      HttpStatus.OK,
      { token },
      'CSRF token generated',
    );
    return res.status(response.statusCode).json(response);
  }
}
