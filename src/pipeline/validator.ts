/**
 * Pipeline validation: stage ids and the `needs` graph.
 */

import { TypedError, createTypedError } from '../domain/errors';
import { PipelineDefinition, StageDefinition } from '../domain/pipeline';

/** Validate the stage graph. Returns every problem found. */
export function validatePipeline(definition: PipelineDefinition): TypedError[] {
  const errors: TypedError[] = [];
  const ids = new Set<string>();

  if (definition.stages.length === 0) {
    errors.push(
      createTypedError({
        code: 'PIPELINE.NO_STAGES',
        message: 'Pipeline must declare at least one stage',
      }),
    );
  }

  for (const stage of definition.stages) {
    if (ids.has(stage.id)) {
      errors.push(
        createTypedError({
          code: 'PIPELINE.DUPLICATE_STAGE',
          message: `Duplicate stage id "${stage.id}"`,
          details: { stageId: stage.id },
        }),
      );
    }
    ids.add(stage.id);

    if (stage.targets.length === 0) {
      errors.push(
        createTypedError({
          code: 'PIPELINE.NO_TARGETS',
          message: `Stage "${stage.id}" has no targets`,
          details: { stageId: stage.id },
        }),
      );
    }
  }

  for (const stage of definition.stages) {
    for (const dep of stage.needs ?? []) {
      if (dep === stage.id) {
        errors.push(
          createTypedError({
            code: 'PIPELINE.SELF_DEPENDENCY',
            message: `Stage "${stage.id}" depends on itself`,
            details: { stageId: stage.id },
          }),
        );
      } else if (!ids.has(dep)) {
        errors.push(
          createTypedError({
            code: 'PIPELINE.UNKNOWN_STAGE',
            message: `Stage "${stage.id}" needs unknown stage "${dep}"`,
            details: { stageId: stage.id, needs: dep },
          }),
        );
      }
    }
  }

  const cycle = findCycle(definition.stages);
  if (cycle) {
    errors.push(
      createTypedError({
        code: 'PIPELINE.CYCLE_DETECTED',
        message: `Stage dependency graph contains a cycle: ${cycle.join(' -> ')}`,
        details: { cycle },
        suggestedFixes: [
          { type: 'REMOVE_CYCLE', params: {}, description: 'Remove circular needs between stages' },
        ],
      }),
    );
  }

  return errors;
}

/** DFS over `needs`; returns the first cycle as a closed path of stage ids. Self-loops are reported separately. */
function findCycle(stages: StageDefinition[]): string[] | undefined {
  const stageMap = new Map(stages.map((s) => [s.id, s]));
  const visited = new Set<string>();
  const stack: string[] = [];

  function visit(stageId: string): string[] | undefined {
    const open = stack.indexOf(stageId);
    if (open !== -1) return [...stack.slice(open), stageId];
    if (visited.has(stageId)) return undefined;

    visited.add(stageId);
    stack.push(stageId);
    for (const dep of stageMap.get(stageId)?.needs ?? []) {
      if (dep === stageId) continue;
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    return undefined;
  }

  for (const stage of stages) {
    const cycle = visit(stage.id);
    if (cycle) return cycle;
  }
  return undefined;
}

/** Kahn's algorithm over `needs`, starting from the roots in declaration order. Assumes a validated graph. */
export function stageOrder(stages: StageDefinition[]): string[] {
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const stage of stages) {
    inDegree.set(stage.id, 0);
    dependents.set(stage.id, []);
  }
  // If B needs A, then A -> B
  for (const stage of stages) {
    for (const dep of new Set(stage.needs ?? [])) {
      dependents.get(dep)?.push(stage.id);
      inDegree.set(stage.id, (inDegree.get(stage.id) ?? 0) + 1);
    }
  }

  const queue = stages.filter((s) => inDegree.get(s.id) === 0).map((s) => s.id);
  const order: string[] = [];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    order.push(current);
    for (const next of dependents.get(current) ?? []) {
      const degree = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, degree);
      if (degree === 0) queue.push(next);
    }
  }
  return order;
}
