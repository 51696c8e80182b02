import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PayeeCleanupModule } from './payee-cleanup/payee-cleanup.module';
import { PayeeCleanupRule } from './payee-cleanup/entities/payee-cleanup-rule.entity';
import { PayeeRuleApplication } from './payee-cleanup/entities/payee-rule-application.entity';
import { PayeeRuleReview } from './payee-cleanup/entities/payee-rule-review.entity';
import { readBoolean, readInt } from './common/config/config-values';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'mysql',
        host: configService.get<string>('DATABASE_HOST', 'localhost'),
        port: readInt(configService, 'DATABASE_PORT', 3306),
        username: configService.get<string>('DATABASE_USERNAME', 'root'),
        password: configService.get<string>('DATABASE_PASSWORD', ''),
        database: configService.get<string>('DATABASE_NAME', 'payee_cleanup'),
        entities: [PayeeCleanupRule, PayeeRuleApplication, PayeeRuleReview],
        // 개발 환경에서만 사용
        synchronize: readBoolean(configService, 'DATABASE_SYNCHRONIZE', false),
        logging: false,
      }),
    }),
    PayeeCleanupModule,
  ],
})
export class AppModule {}
