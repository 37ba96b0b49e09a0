/**
 * Helpers de validacion con Zod para requests.
 *
 * Idea:
 * - Validar y normalizar entradas lo mas cerca posible del borde HTTP.
 * - Los defaults del schema quedan aplicados en `req.body`; el controlador
 *   vuelve a leerlo con el mismo schema para obtener el tipo.
 */
import type { NextFunction, Request, Response } from 'express';
import type { ZodTypeAny } from 'zod';
import { ErrorAplicacion } from '../errores/errorAplicacion';

export function validarCuerpo(schema: ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const resultado = schema.safeParse(req.body);
    if (!resultado.success) {
      next(new ErrorAplicacion('VALIDACION', 'Payload invalido', 400, resultado.error.flatten()));
      return;
    }
    req.body = resultado.data;
    next();
  };
}
