import { Router } from 'express';
import { validate } from '../../middleware/validate.js';
import { createAirportsController } from './airports.controller.js';
import type { AirportResolver } from './airports.service.js';
import { airportParamsSchema } from './airports.validation.js';

const airportRoutes = (resolver: AirportResolver): Router => {
  const router = Router();
  const ctrl = createAirportsController(resolver);

  router.get(
    '/:code',
    validate(airportParamsSchema, 'params'),
    ctrl.describe,
  );

  return router;
};

export default airportRoutes;
