import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PayeeCleanupService } from './payee-cleanup/payee-cleanup.service';

// 배포 점검용: DB 연결과 LLM 연결을 확인한 뒤 종료
async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    const payeeCleanupService = app.get(PayeeCleanupService);
    await payeeCleanupService.checkLlmHealth();

    const pendingRules = await payeeCleanupService.getPendingRules();
    logger.log(
      `Payee cleanup engine is ready, ${pendingRules.length} rule(s) awaiting review`,
    );
  } catch (error) {
    logger.error(
      'Payee cleanup engine health check failed',
      error instanceof Error ? error.stack : String(error),
    );
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

void bootstrap();
