/**
 * Utilidades de texto (normalizaciones/formatos).
 */

export function normalizarEspacios(valor: string): string {
  return String(valor || '')
    .trim()
    .replace(/\s+/g, ' ');
}

/**
 * Reemplaza simbolos tipograficos comunes por equivalentes que cualquier
 * fuente del PDF puede codificar.
 */
export function sanitizarTextoPdf(valor: string) {
  return String(valor ?? '')
    .replace(/\u2192/g, '->')
    .replace(/\u2190/g, '<-')
    .replace(/\u00b7/g, '-')
    .replace(/\u2022/g, '-')
    .replace(/\u2014/g, '-')
    .replace(/\u2013/g, '-')
    .replace(/\u201c|\u201d/g, '"')
    .replace(/\u2018|\u2019/g, "'")
    .replace(/\u2026/g, '...');
}

/**
 * Nombre de archivo sin directorio ni extension ("el pato.png" -> "el pato").
 * Conserva espacios y mayusculas tal cual: es el texto de la leyenda.
 */
export function obtenerNombreBase(nombreArchivo: string): string {
  const sinDirectorio = String(nombreArchivo ?? '').split(/[\\/]/).pop() ?? '';
  const punto = sinDirectorio.lastIndexOf('.');
  return punto > 0 ? sinDirectorio.slice(0, punto) : sinDirectorio;
}

export function obtenerExtension(nombreArchivo: string): string {
  const sinDirectorio = String(nombreArchivo ?? '').split(/[\\/]/).pop() ?? '';
  const punto = sinDirectorio.lastIndexOf('.');
  return punto > 0 ? sinDirectorio.slice(punto).toLowerCase() : '';
}

/**
 * Normaliza un texto para usarlo como parte de un nombre de archivo.
 * - Elimina acentos/diacríticos.
 * - Reemplaza espacios por guiones bajos.
 * - Remueve caracteres inválidos (Windows/macOS/Linux).
 */
export function normalizarParaNombreArchivo(
  valor: unknown,
  opciones?: {
    maxLen?: number;
  }
): string {
  const maxLen = Math.max(8, Math.floor(opciones?.maxLen ?? 80));
  const base = String(valor ?? '')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim();
  if (!base) return '';

  let salida = base
    .replace(/\s+/g, '_')
    // caracteres prohibidos en Windows: <>:"/\|?*
    .replace(/[<>:"/\\|?*]/g, '')
    .replace(/[\p{Cc}]/gu, '')
    .replace(/[^a-zA-Z0-9._-]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/_+/g, '_')
    .replace(/^[-_.]+/, '')
    .replace(/[-_.]+$/, '');

  if (!salida) return '';
  if (salida.length > maxLen) {
    salida = salida.slice(0, maxLen).replace(/[-_.]+$/, '');
  }
  return salida;
}
