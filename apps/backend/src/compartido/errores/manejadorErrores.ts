/**
 * Middleware de manejo de errores para el API.
 *
 * Contrato:
 * - `ErrorAplicacion` (incluidos los errores del generador) se serializa con su codigo/estado/detalles.
 * - JSON malformado o payload demasiado grande se normalizan a 400/413.
 * - Para errores no esperados, se registra (excepto en tests) y se devuelve 500.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion } from './errorAplicacion';
import { logError } from '../../infraestructura/logging/logger';

function obtenerStatusYTipo(error: unknown): { status: unknown; type: unknown } {
  if (typeof error !== 'object' || !error) {
    return { status: undefined, type: undefined };
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  const type = 'type' in error ? error.type : undefined;
  return { status, type };
}

function esPayloadDemasiadoGrande(error: unknown): boolean {
  const { status, type } = obtenerStatusYTipo(error);
  return status === 413 || type === 'entity.too.large';
}

function esJsonMalformado(error: unknown): boolean {
  const { status, type } = obtenerStatusYTipo(error);
  return status === 400 && type === 'entity.parse.failed';
}

function responderErrorSimple(res: Response, status: number, codigo: string, mensaje: string) {
  res.status(status).json({
    error: {
      codigo,
      mensaje
    }
  });
}

function contextoSolicitud(req: Request, res: Response) {
  return {
    requestId: String(res.locals.idSolicitud ?? ''),
    route: req.path,
    method: req.method
  };
}

export function manejadorErrores(error: unknown, req: Request, res: Response, next: NextFunction) {
  // La respuesta (p. ej. un PDF) ya empezo a enviarse: Express cierra la conexion.
  if (res.headersSent) {
    next(error);
    return;
  }

  if (esPayloadDemasiadoGrande(error)) {
    responderErrorSimple(res, 413, 'PAYLOAD_DEMASIADO_GRANDE', 'Payload demasiado grande');
    return;
  }

  if (esJsonMalformado(error)) {
    responderErrorSimple(res, 400, 'JSON_INVALIDO', 'El cuerpo no es JSON valido');
    return;
  }

  if (error instanceof ErrorAplicacion) {
    if (error.estadoHttp >= 500 && process.env.NODE_ENV !== 'test') {
      logError('Error controlado 5xx en request', error, {
        ...contextoSolicitud(req, res),
        status: error.estadoHttp,
        codigo: error.codigo
      });
    }

    res.status(error.estadoHttp).json({
      error: {
        codigo: error.codigo,
        mensaje: error.message,
        detalles: error.detalles
      }
    });
    return;
  }

  // Errores no esperados: mensaje generico en produccion.
  const entorno = process.env.NODE_ENV;
  if (entorno !== 'test') {
    logError('Error no controlado en request', error, contextoSolicitud(req, res));
  }

  const exponerMensaje = entorno !== 'production';
  const mensaje = exponerMensaje && error instanceof Error ? error.message : 'Error interno';
  responderErrorSimple(res, 500, 'ERROR_INTERNO', mensaje);
}
