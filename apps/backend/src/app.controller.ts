import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { DataEnvelope } from '@discussion/shared-types';

@Controller()
@ApiTags('health')
export class AppController {
  @Get('health')
  @ApiOperation({ summary: 'Liveness probe' })
  getHealth(): DataEnvelope<{ status: string }> {
    return { data: { status: 'ok' } };
  }
}
