import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { EXTINCTION_FLOOR, isSpecies } from '../daisyworld';
import { stepPlanet } from '../world';
import { requirePlanet, sendValidationError } from './helpers';

const router = Router();

// Range checks on user input live here, not in the planet
const LuminosityBodySchema = z.object({
  luminosity: z.number().positive().max(100),
}).strict();

const ToggleBodySchema = z.object({
  enabled: z.boolean(),
}).strict();

// Reseeded covers respect the extinction floor
const threshold = z.number().min(EXTINCTION_FLOOR).max(1);

const BoostBodySchema = z.object({
  thresholds: z.object({
    white: threshold.optional(),
    black: threshold.optional(),
    gray: threshold.optional(),
  }).strict().optional(),
}).strict();

const StepBodySchema = z.object({
  steps: z.number().int().min(1).max(100000).default(1),
}).strict();

router.post('/luminosity', (req: Request, res: Response) => {
  const planet = requirePlanet(res);
  if (!planet) return;

  const body = LuminosityBodySchema.safeParse(req.body);
  if (!body.success) {
    sendValidationError(res, body.error, 'request body');
    return;
  }

  planet.setLuminosity(body.data.luminosity);
  res.status(200).json(planet.snapshot());
});

router.post('/species/:species', (req: Request, res: Response) => {
  const planet = requirePlanet(res);
  if (!planet) return;

  const { species } = req.params;
  if (!isSpecies(species)) {
    res.status(404).json({ error: `Unknown species "${species}"` });
    return;
  }

  const body = ToggleBodySchema.safeParse(req.body);
  if (!body.success) {
    sendValidationError(res, body.error, 'request body');
    return;
  }

  planet.setSpeciesEnabled(species, body.data.enabled);
  res.status(200).json(planet.snapshot());
});

router.post('/growth', (req: Request, res: Response) => {
  const planet = requirePlanet(res);
  if (!planet) return;

  const body = ToggleBodySchema.safeParse(req.body);
  if (!body.success) {
    sendValidationError(res, body.error, 'request body');
    return;
  }

  planet.setDaisyGrowthAndDeath(body.data.enabled);
  res.status(200).json(planet.snapshot());
});

router.post('/round-world', (req: Request, res: Response) => {
  const planet = requirePlanet(res);
  if (!planet) return;

  const body = ToggleBodySchema.safeParse(req.body);
  if (!body.success) {
    sendValidationError(res, body.error, 'request body');
    return;
  }

  planet.setRoundWorld(body.data.enabled);
  res.status(200).json(planet.snapshot());
});

router.post('/boost', (req: Request, res: Response) => {
  const planet = requirePlanet(res);
  if (!planet) return;

  const body = BoostBodySchema.safeParse(req.body ?? {});
  if (!body.success) {
    sendValidationError(res, body.error, 'request body');
    return;
  }

  planet.boostIfExtinct(body.data.thresholds);
  res.status(200).json(planet.snapshot());
});

router.post('/step', (req: Request, res: Response) => {
  const planet = requirePlanet(res);
  if (!planet) return;

  const body = StepBodySchema.safeParse(req.body ?? {});
  if (!body.success) {
    sendValidationError(res, body.error, 'request body');
    return;
  }

  for (let i = 0; i < body.data.steps; i++) {
    stepPlanet();
  }
  res.status(200).json(planet.snapshot());
});

export default router;
