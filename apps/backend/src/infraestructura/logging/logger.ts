/**
 * logger
 *
 * Responsabilidad: logging estructurado (una linea JSON por evento) para la API,
 * la CLI y el motor de composicion.
 * Limites: no volcar bytes de imagen ni buffers en los metadatos.
 */
export type NivelLog = 'info' | 'warn' | 'error' | 'ok' | 'system';

type Meta = Record<string, unknown>;

const servicio = 'generador-loteria';
const env = process.env.NODE_ENV ?? 'development';

function serializarError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }
  return { value: String(error) };
}

function nivelEstandar(level: NivelLog): 'info' | 'warn' | 'error' {
  if (level === 'warn') return 'warn';
  if (level === 'error') return 'error';
  return 'info';
}

export function log(level: NivelLog, msg: string, meta: Meta = {}) {
  const levelStd = nivelEstandar(level);
  const entry = {
    timestamp: new Date().toISOString(),
    service: servicio,
    env,
    level: levelStd,
    message: msg,
    ...meta
  };

  const line = JSON.stringify(entry);
  if (levelStd === 'error') console.error(line);
  else if (levelStd === 'warn') console.warn(line);
  else console.log(line);
}

export function logError(msg: string, error?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarError(error) });
}
