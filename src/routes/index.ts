import { Router } from 'express';
import alignmentRoutes from './alignment.routes';

const router = Router();

// Mount routes
router.use('/alignment', alignmentRoutes);

// Health check for API
router.get('/health', (req, res) => {
  res.json({
    success: true,
    message: 'API is running',
    timestamp: new Date().toISOString(),
  });
});

export default router;
