import { Router } from 'express';

import { getModelInfo, listRecommendedModels } from '../llm/models';

export const createModelsRouter = (defaultModel: string): Router => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      default: { name: defaultModel, ...getModelInfo(defaultModel) },
      models: listRecommendedModels(),
    });
  });

  return router;
};
