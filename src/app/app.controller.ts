import { Controller, Get } from '@nestjs/common';

import { StatusResponse } from '@libs/interfaces';

@Controller()
export class AppController {
  /**
   * Liveness probe for the container platform. Independent of any session.
   *
   * @returns {StatusResponse} Always `{ status: 'healthy' }`.
   */
  @Get('health')
  public getHealth(): StatusResponse {
    return { status: 'healthy' };
  }
}
