/**
 * Crea la app HTTP (Express) del generador.
 *
 * Principios:
 * - Seguridad por defecto (cabeceras, rate-limit)
 * - Validación en modulos (Zod) y error envelope consistente
 * - Sin side-effects al importar (fácil de testear)
 */
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { configuracion } from './configuracion';
import { crearRouterApi } from './rutas';
import { manejadorErrores } from './compartido/errores/manejadorErrores';
import { middlewareIdSolicitud, middlewareRegistroSolicitud } from './compartido/observabilidad/middlewareObservabilidad';

export function crearApp() {
  const app = express();

  app.disable('x-powered-by');

  app.use(helmet());
  app.use(
    cors({
      origin: configuracion.corsOrigenes,
      // El cliente lee el nombre del PDF y el resumen de la generacion.
      exposedHeaders: ['Content-Disposition', 'x-loteria-paginas', 'x-loteria-fallas', 'x-request-id']
    })
  );
  app.use(express.json({ limit: configuracion.limiteJson }));
  app.use(middlewareIdSolicitud);
  app.use(middlewareRegistroSolicitud);
  app.use(
    rateLimit({
      windowMs: configuracion.rateLimitWindowMs,
      limit: configuracion.rateLimitLimit,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.path.startsWith('/api/salud')
    })
  );

  app.use('/api', crearRouterApi());

  app.use(manejadorErrores);

  return app;
}
