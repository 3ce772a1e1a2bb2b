import { Router } from 'express';
import * as alignmentController from '../controllers/alignment.controller';
import { validate, schemas } from '../middleware/validate';

const router = Router();

// Synchronous alignment
router.post('/', validate(schemas.align), alignmentController.alignTranscript);
router.post('/textgrid', validate(schemas.alignTextGrid), alignmentController.alignTextGrid);

// Caption rendering helpers
router.post('/captions', validate(schemas.captions), alignmentController.buildCaptions);

// Queued alignment
router.post('/jobs', validate(schemas.createAlignmentJob), alignmentController.createAlignmentJob);
router.get('/jobs/:id', alignmentController.getAlignmentJob);

export default router;
