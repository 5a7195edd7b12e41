import { Router } from 'express';
import { z } from 'zod';

import { asyncRoute, pipelineOf, sendValidationErrors } from './http';

const router = Router();

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
  offset: z.coerce.number().int().min(0).default(0),
});

router.get(
  '/',
  asyncRoute(async (req, res) => {
    const validation = listQuerySchema.safeParse(req.query);

    if (!validation.success) {
      sendValidationErrors(res, validation.error.issues);
      return;
    }

    const { limit, offset } = validation.data;
    const optimizations = await pipelineOf(req).listHistory(limit, offset);

    res.json({ optimizations, limit, offset });
  }),
);

router.get(
  '/:id',
  asyncRoute(async (req, res) => {
    res.json(await pipelineOf(req).getRecord(req.params.id));
  }),
);

router.delete(
  '/:id',
  asyncRoute(async (req, res) => {
    await pipelineOf(req).deleteRecord(req.params.id);
    res.status(204).end();
  }),
);

export default router;
