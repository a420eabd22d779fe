import { asyncHandler } from '../../utils/asyncHandler.js';
import type { MeetingSearchService } from './meetings.service.js';
import type { MeetingSearchRequest } from './meetings.validation.js';

export const createMeetingsController = (meetings: MeetingSearchService) => ({
  // ── Search Meeting Destinations ──
  search: asyncHandler<MeetingSearchRequest>(async (req, res) => {
    const result = await meetings.findMeetingDestinations(req.body);
    res.json({ success: true, data: result });
  }),
});
