import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { QueryLog } from './query-log.entity';
import { Intent, ValidatorState } from '../ai/rag/rag.types';
import { errorMessage } from '../common/utils/errors';

export interface QueryLogEntry {
  query: string;
  intent: Intent;
  latencyMs: number;
  chunksRetrieved: number;
  validatorState: ValidatorState;
  retryCount: number;
  degraded: boolean;
}

@Injectable()
export class QueryLogService {
  private readonly logger = new Logger(QueryLogService.name);

  constructor(
    @InjectRepository(QueryLog)
    private readonly queryLogRepository: Repository<QueryLog>,
  ) {}

  /** Persist one completed request. Storage errors are logged, never thrown. */
  async record(entry: QueryLogEntry): Promise<QueryLog | null> {
    try {
      const row = this.queryLogRepository.create(entry);
      const saved = await this.queryLogRepository.save(row);
      this.logger.debug(`🗂️ Query log ${saved.id} (${entry.intent}, ${entry.validatorState})`);
      return saved;
    } catch (error) {
      this.logger.warn(`⚠️ Failed to write query log: ${errorMessage(error)}`);
      return null;
    }
  }
}
