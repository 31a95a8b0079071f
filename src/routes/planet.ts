import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { DISPLAY_BAND_COUNT, LATITUDE_BAND_COUNT, SPECIES } from '../daisyworld';
import { finiteOrNull, requirePlanet, sendValidationError } from './helpers';

const router = Router();

const LatitudeQuerySchema = z.object({
  bands: z.coerce.number().int().positive()
    .refine((n) => LATITUDE_BAND_COUNT % n === 0, {
      message: `bands must divide ${LATITUDE_BAND_COUNT}`,
    })
    .default(DISPLAY_BAND_COUNT),
});

router.get('/', (req: Request, res: Response) => {
  const planet = requirePlanet(res);
  if (!planet) return;

  res.status(200).json(planet.snapshot());
});

router.get('/latitudes', (req: Request, res: Response) => {
  const planet = requirePlanet(res);
  if (!planet) return;

  if (!planet.isRoundWorld()) {
    res.status(409).json({ error: 'Planet is not in round-world mode' });
    return;
  }

  const query = LatitudeQuerySchema.safeParse(req.query);
  if (!query.success) {
    sendValidationError(res, query.error, 'query');
    return;
  }

  const displayCount = query.data.bands;
  const displayBands: Record<string, number[]> = {};
  const stats: Record<string, { min: number; mean: number | null; max: number }> = {};

  for (const species of SPECIES) {
    displayBands[species] = planet.getDisplayBandProportions(species, displayCount);
    const s = planet.getLatitudeStats(species);
    stats[species] = { min: s.min, mean: finiteOrNull(s.mean), max: s.max };
  }

  res.status(200).json({
    step: planet.getUpdateCount(),
    time: planet.getTime(),
    bandCount: planet.getBandCount(),
    displayBandCount: displayCount,
    displayBands,
    stats,
  });
});

export default router;
