/**
 * Rutas de generacion de loterias.
 */
import { Router } from 'express';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import { generarLoteriaPdf } from './controladorLoteria';
import { esquemaGenerarLoteria } from './validacionesLoteria';

const router = Router();

router.post('/generar', validarCuerpo(esquemaGenerarLoteria), generarLoteriaPdf);

export default router;
