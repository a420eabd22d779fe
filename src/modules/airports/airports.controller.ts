import { asyncHandler } from '../../utils/asyncHandler.js';
import type { AirportResolver } from './airports.service.js';

export const createAirportsController = (resolver: AirportResolver) => ({
  // ── Describe Location Code ──
  describe: asyncHandler(async (req, res) => {
    res.json({ success: true, data: resolver.describe(req.params.code) });
  }),
});
