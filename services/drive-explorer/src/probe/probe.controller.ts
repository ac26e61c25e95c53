import { Controller, Get } from '@nestjs/common';
import * as packageJson from '../../package.json';

@Controller('probe')
export class ProbeController {
  @Get()
  public probe() {
    return { status: 'ok', version: packageJson.version };
  }
}
