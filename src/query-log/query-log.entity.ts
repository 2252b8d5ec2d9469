import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn } from 'typeorm';
import { Intent, ValidatorState } from '../ai/rag/rag.types';

@Entity('query_log')
export class QueryLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'text' })
  query!: string;

  @Column({ type: 'enum', enum: Intent })
  intent!: Intent;

  @Column({ type: 'int' })
  latencyMs!: number;

  @Column({ type: 'int' })
  chunksRetrieved!: number;

  @Column({ type: 'enum', enum: ValidatorState })
  validatorState!: ValidatorState;

  @Column({ type: 'int', default: 0 })
  retryCount!: number;

  @Column({ default: false })
  degraded!: boolean;

  @CreateDateColumn()
  createdAt!: Date;
}
