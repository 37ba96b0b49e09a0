/**
 * Registro central de rutas del API.
 */
import { Router } from 'express';
import rutasSalud from './compartido/salud/rutasSalud';
import rutasLoteria from './modulos/modulo_loteria/rutasLoteria';

export function crearRouterApi() {
  const router = Router();

  router.use('/salud', rutasSalud);
  router.use('/loteria', rutasLoteria);

  return router;
}
