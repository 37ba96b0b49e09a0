/**
 * Endpoints de salud del generador.
 */
import { Router } from 'express';

const router = Router();
const servicio = 'generador-loteria';

export interface RespuestaLiveness {
  estado: 'ok';
  tiempoActivo: number;
  servicio: string;
  env: string;
}

router.get('/live', (_req, res) => {
  const payload: RespuestaLiveness = {
    estado: 'ok',
    tiempoActivo: process.uptime(),
    servicio,
    env: process.env.NODE_ENV ?? 'development'
  };
  res.json(payload);
});

export default router;
