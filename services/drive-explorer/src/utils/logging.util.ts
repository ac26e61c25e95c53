import { type ConfigService } from '@nestjs/config';
import { createConcealer } from '@drive-explorer/utils';
import type { Config } from '../config';

export type Concealer = (value: string | null | undefined) => string;

/** Smears diagnostic values (site ids, drive ids, file names) unless the deployment discloses them. */
export function getConcealer(configService: ConfigService<Config, true>): Concealer {
  return createConcealer(configService.get('app.logsDiagnosticsDataPolicy', { infer: true }));
}
