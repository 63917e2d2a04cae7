/**
 * Pipeline domain model.
 *
 * A pipeline runs several matrix stages over shared default dimension
 * values and shared override rules. Each stage contributes its own build
 * targets, may pin some dimensions, and may depend on earlier stages.
 */

import { TypedError } from './errors';
import { OverrideRule } from './matrix';
import { RunOptions } from './run';

export interface StageDefinition {
  id: string;
  name?: string;
  /** Values of the target dimension for this stage. */
  targets: string[];
  /** Dimensions pinned for this stage, replacing the defaults. */
  dimensions?: Record<string, string[]>;
  /** Stage runs only if each value is among the pipeline defaults. */
  when?: Record<string, string>;
  /** Stages that must succeed first. */
  needs?: string[];
  /** Artifact specs by target, in configuration spelling. */
  artifacts?: Record<string, unknown>;
  failFast?: boolean;
}

export interface PipelineDefinition {
  name?: string;
  /** Default values per dimension, in declaration order. */
  defaults: Record<string, string[]>;
  excludes?: OverrideRule[];
  includes?: OverrideRule[];
  stages: StageDefinition[];
  options?: Partial<RunOptions>;
}

export enum StageStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Skipped = 'skipped',
  Canceled = 'canceled',
}

export enum PipelineStatus {
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
}

export interface StageRecord {
  id: string;
  status: StageStatus;
  runId?: string;
  skipReason?: string;
  jobCount?: number;
  /** Set when the stage could not be planned or its run failed outright. */
  error?: TypedError;
}

export interface PipelineRun {
  id: string;
  name?: string;
  definition: PipelineDefinition;
  status: PipelineStatus;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
  /** Stage execution order. */
  order: string[];
  stages: Record<string, StageRecord>;
  success?: boolean;
}
