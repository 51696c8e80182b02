import { HttpException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  DataSource,
  IsNull,
  QueryFailedError,
  QueryRunner,
  Repository,
} from 'typeorm';
import {
  PayeeCleanupRule,
  RuleStatus,
} from '../entities/payee-cleanup-rule.entity';
import { PayeeRuleApplication } from '../entities/payee-rule-application.entity';
import {
  PayeeRuleReview,
  ReviewDecision,
} from '../entities/payee-rule-review.entity';
import {
  PayeeRuleNotFoundException,
  PayeeRuleStateException,
  PayeeRuleStoreException,
} from '../exceptions/payee-cleanup.exceptions';
import {
  NewRuleApplication,
  PayeeRuleStore,
  RecordedApplication,
  RuleCounterUpdate,
  RuleReview,
} from './payee-rule.store';

@Injectable()
export class TypeOrmPayeeRuleStore extends PayeeRuleStore {
  private readonly logger = new Logger(TypeOrmPayeeRuleStore.name);

  constructor(
    @InjectRepository(PayeeCleanupRule)
    private readonly ruleRepository: Repository<PayeeCleanupRule>,
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  async save(rule: PayeeCleanupRule): Promise<PayeeCleanupRule> {
    return this.run('save', async () => {
      await this.ruleRepository.insert(rule);
      return rule;
    });
  }

  async findById(id: string): Promise<PayeeCleanupRule | null> {
    return this.run('findById', () =>
      this.ruleRepository.findOne({ where: { id } }),
    );
  }

  async findByStatus(status: RuleStatus): Promise<PayeeCleanupRule[]> {
    return this.run('findByStatus', () =>
      this.ruleRepository.find({
        where: { status },
        order: { created_at: 'DESC', id: 'ASC' },
      }),
    );
  }

  async reviewPendingRule(
    id: string,
    review: RuleReview,
  ): Promise<PayeeCleanupRule> {
    const status =
      review.decision === ReviewDecision.APPROVED
        ? RuleStatus.APPROVED
        : RuleStatus.REJECTED;

    return this.inTransaction('reviewPendingRule', async (queryRunner) => {
      // 조건부 UPDATE: 다른 검토가 먼저 커밋되면 영향받은 행이 0이 된다
      const result = await queryRunner.manager.update(
        PayeeCleanupRule,
        { id, status: RuleStatus.PENDING },
        { ...review.changes, status, updated_at: new Date() },
      );

      if (!result.affected) {
        const existing = await queryRunner.manager.findOne(PayeeCleanupRule, {
          where: { id },
        });
        if (!existing) {
          throw new PayeeRuleNotFoundException(id);
        }
        throw new PayeeRuleStateException(id, existing.status);
      }

      const record = new PayeeRuleReview();
      record.rule_id = id;
      record.decision = review.decision;
      record.reason = review.reason ?? null;
      await queryRunner.manager.save(record);

      const updated = await queryRunner.manager.findOne(PayeeCleanupRule, {
        where: { id },
      });
      if (!updated) {
        throw new PayeeRuleNotFoundException(id);
      }
      return updated;
    });
  }

  async recordApplication(
    application: NewRuleApplication,
  ): Promise<RecordedApplication> {
    return this.inTransaction('recordApplication', async (queryRunner) => {
      const entity = queryRunner.manager.create(PayeeRuleApplication, {
        ...application,
        feedback_status: null,
        feedback_at: null,
      });

      let saved: PayeeRuleApplication;
      try {
        saved = await queryRunner.manager.save(entity);
      } catch (error) {
        if (!this.isDuplicateEntry(error)) {
          throw error;
        }

        const existing = await queryRunner.manager.findOne(
          PayeeRuleApplication,
          {
            where: {
              transaction_id: application.transaction_id,
              rule_id: application.rule_id ?? IsNull(),
            },
          },
        );
        if (!existing) {
          throw error;
        }

        this.logger.debug(
          `Application already recorded for transaction ${application.transaction_id} and rule ${application.rule_id}`,
        );
        return { application: existing, created: false };
      }

      if (application.rule_id !== null) {
        await queryRunner.manager.increment(
          PayeeCleanupRule,
          { id: application.rule_id },
          'usage_count',
          1,
        );
      }
      return { application: saved, created: true };
    });
  }

  async updateRuleCounters(
    id: string,
    update: (rule: PayeeCleanupRule) => RuleCounterUpdate,
  ): Promise<PayeeCleanupRule> {
    return this.inTransaction('updateRuleCounters', async (queryRunner) => {
      const rule = await queryRunner.manager.findOne(PayeeCleanupRule, {
        where: { id },
        lock: { mode: 'pessimistic_write' },
      });
      if (!rule) {
        throw new PayeeRuleNotFoundException(id);
      }

      const change = update(rule);
      rule.usage_count += change.usageDelta;
      rule.success_rate = change.successRate;
      rule.updated_at = new Date();

      await queryRunner.manager.update(
        PayeeCleanupRule,
        { id },
        {
          usage_count: rule.usage_count,
          success_rate: rule.success_rate,
          updated_at: rule.updated_at,
        },
      );

      if (change.feedback) {
        const unresolved = await queryRunner.manager.findOne(
          PayeeRuleApplication,
          {
            where: { rule_id: id, feedback_status: IsNull() },
            order: { applied_at: 'DESC', id: 'DESC' },
          },
        );

        if (unresolved) {
          await queryRunner.manager.update(
            PayeeRuleApplication,
            { id: unresolved.id },
            { feedback_status: change.feedback, feedback_at: new Date() },
          );
        }
      }

      return rule;
    });
  }

  private async inTransaction<T>(
    operation: string,
    work: (queryRunner: QueryRunner) => Promise<T>,
  ): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await work(queryRunner);
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw this.toStoreError(operation, error);
    } finally {
      await queryRunner.release();
    }
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw this.toStoreError(operation, error);
    }
  }

  private toStoreError(operation: string, error: unknown): Error {
    // 도메인 예외(NotFound, InvalidState)는 그대로 전달
    if (error instanceof HttpException) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Rule store ${operation} failed: ${message}`);
    return new PayeeRuleStoreException(operation, error);
  }

  private isDuplicateEntry(error: unknown): boolean {
    if (!(error instanceof QueryFailedError)) {
      return false;
    }
    const driverError: unknown = error.driverError;
    return (
      typeof driverError === 'object' &&
      driverError !== null &&
      'code' in driverError &&
      driverError.code === 'ER_DUP_ENTRY'
    );
  }
}
