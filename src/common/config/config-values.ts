import { ConfigService } from '@nestjs/config';

// 파싱에 실패한 값은 기본값으로 대체한다

export function readInt(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const parsed = parseInt(configService.get<string>(key, String(fallback)), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function readNumber(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const parsed = parseFloat(configService.get<string>(key, String(fallback)));
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function readBoolean(
  configService: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const value = configService.get<string>(key, String(fallback));
  return value.trim().toLowerCase() === 'true';
}
