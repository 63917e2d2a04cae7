/**
 * Plan API routes.
 *
 * POST /plans: Preview the job set of a matrix without building anything
 */

import { Router } from 'express';
import { parseArtifactMap } from '../artifacts/artifact-spec';
import { isRecord } from '../guards';
import { describeCell } from '../matrix/cell';
import { parseMatrixConfig } from '../matrix/parse';
import { planMatrixOrThrow } from '../matrix/planner';
import { sendError } from './middleware';

export function createPlanRoutes(): Router {
  const router = Router();

  /**
   * POST /plans
   * Body is a matrix configuration, optionally with `artifacts` beside it.
   */
  router.post('/plans', (req, res) => {
    try {
      const body: unknown = req.body;
      const matrix = parseMatrixConfig(body);
      const { artifacts, warnings } = parseArtifactMap(isRecord(body) ? body.artifacts : undefined);
      const plan = planMatrixOrThrow(matrix, { artifacts });

      res.json({
        plan: {
          planHash: plan.planHash,
          candidateCount: plan.candidateCount,
          identityOrder: plan.registry.identityOrder,
          jobs: plan.jobs,
          excluded: plan.excluded.map((record) => ({
            cell: record.cell,
            ruleIndex: record.ruleIndex,
            description: record.rule.description ?? describeCell(record.rule.values),
          })),
          restored: plan.restored,
          appended: plan.appended,
          warnings: [...plan.warnings, ...warnings],
        },
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
