import { Router } from 'express';
import { searchLimiter } from '../../middleware/rateLimiter.js';
import { validate } from '../../middleware/validate.js';
import { createMeetingsController } from './meetings.controller.js';
import type { MeetingSearchService } from './meetings.service.js';
import { meetingSearchSchema } from './meetings.validation.js';

const meetingRoutes = (meetings: MeetingSearchService): Router => {
  const router = Router();
  const ctrl = createMeetingsController(meetings);

  router.post(
    '/search',
    searchLimiter, // One search fans out into many provider calls
    validate(meetingSearchSchema),
    ctrl.search,
  );

  return router;
};

export default meetingRoutes;
