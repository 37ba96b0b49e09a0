/**
 * Configuracion centralizada del generador (API + CLI).
 */
import dotenv from 'dotenv';
import path from 'node:path';

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({
  quiet: true,
  path: path.resolve(__dirname, '..', '..', '..', '.env')
});

export function parsearNumeroSeguro(
  valor: unknown,
  porDefecto: number,
  { min, max }: { min?: number; max?: number } = {}
) {
  if (valor === undefined || valor === null || String(valor).trim() === '') return porDefecto;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return clamped;
}

const entorno = process.env.NODE_ENV ?? 'development';
const puerto = parsearNumeroSeguro(process.env.PUERTO_API ?? process.env.PORT, 4000, { min: 1, max: 65535 });
const limiteJson = process.env.LIMITE_JSON ?? '60mb';
const corsOrigenes = (process.env.CORS_ORIGENES ?? 'http://localhost:5173')
  .split(',')
  .map((origen) => origen.trim())
  .filter(Boolean);

const rateLimitWindowMs = parsearNumeroSeguro(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000, {
  min: 1_000,
  max: 24 * 60 * 60 * 1000
});
const rateLimitLimit = parsearNumeroSeguro(process.env.RATE_LIMIT_LIMIT, 60, { min: 1, max: 10_000 });

// Limites del generador: acotan el trabajo por solicitud/corrida.
const maxTablas = Math.floor(parsearNumeroSeguro(process.env.LOTERIA_MAX_TABLAS, 100, { min: 1, max: 1000 }));
const maxImagenes = Math.floor(parsearNumeroSeguro(process.env.LOTERIA_MAX_IMAGENES, 200, { min: 16, max: 2000 }));
const rutaFuenteTtf = String(process.env.LOTERIA_FUENTE_TTF ?? '').trim();
const calidadJpeg = Math.floor(parsearNumeroSeguro(process.env.LOTERIA_CALIDAD_JPEG, 92, { min: 50, max: 100 }));

export const configuracion = {
  entorno,
  puerto,
  limiteJson,
  corsOrigenes,
  rateLimitWindowMs,
  rateLimitLimit,
  maxTablas,
  maxImagenes,
  rutaFuenteTtf,
  calidadJpeg
};

export type Configuracion = typeof configuracion;
