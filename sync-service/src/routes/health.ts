import { Router } from 'express';

import { serviceVersion } from '../version.js';

export const healthRouter = Router();

healthRouter.get('/', (_req, res) => {
  res.json({
    ok: true,
    version: serviceVersion,
    buildDate: process.env.BUILD_DATE ?? null,
  });
});
