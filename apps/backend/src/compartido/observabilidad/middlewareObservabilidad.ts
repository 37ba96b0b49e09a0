/**
 * Id de solicitud y registro de cada request HTTP (una linea por respuesta).
 */
import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { log } from '../../infraestructura/logging/logger';

function obtenerIdSolicitud(req: Request): string {
  const cabecera = req.header('x-request-id');
  return cabecera && cabecera.trim() ? cabecera.trim().slice(0, 128) : randomUUID();
}

function obtenerRuta(req: Request): string {
  const base = String(req.baseUrl || '');
  const plantilla: unknown = req.route?.path;
  const ruta = typeof plantilla === 'string' ? plantilla.trim() : '';
  if (ruta) return `${base}${ruta}`;
  return String(req.path || '/');
}

export function middlewareIdSolicitud(req: Request, res: Response, next: NextFunction) {
  const idSolicitud = obtenerIdSolicitud(req);
  res.setHeader('x-request-id', idSolicitud);
  res.locals.idSolicitud = idSolicitud;
  next();
}

export function middlewareRegistroSolicitud(req: Request, res: Response, next: NextFunction) {
  const inicio = Date.now();
  res.on('finish', () => {
    const estatus = Number(res.statusCode || 0);
    log(estatus >= 500 ? 'error' : estatus >= 400 ? 'warn' : 'info', 'HTTP request', {
      requestId: String(res.locals.idSolicitud ?? ''),
      route: obtenerRuta(req),
      method: req.method,
      status: estatus,
      durationMs: Date.now() - inicio
    });
  });
  next();
}
