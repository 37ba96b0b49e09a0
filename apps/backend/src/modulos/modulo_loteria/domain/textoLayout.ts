/**
 * Medicion y envoltura de leyendas.
 *
 * Las medidas estan en pixeles de pagina: `tamano` es el alto de la fuente
 * en px a 300 DPI. Funciones puras; el resultado depende solo de
 * `(texto, fuente, tamano, anchoMaximo)`.
 */

export interface FuenteMedible {
  anchoTexto(texto: string, tamano: number): number;
  /** Alto completo de una linea (ascendente a descendente). */
  altoLinea(tamano: number): number;
}

export interface EstiloTexto {
  fuente: FuenteMedible;
  tamano: number;
}

export interface MedidaTexto {
  ancho: number;
  alto: number;
}

export function medirTexto(texto: string, estilo: EstiloTexto): MedidaTexto {
  return {
    ancho: estilo.fuente.anchoTexto(texto, estilo.tamano),
    alto: estilo.fuente.altoLinea(estilo.tamano)
  };
}

/**
 * Reparte `texto` en lineas que no excedan `anchoMaximo`.
 *
 * - Si cabe completo, se devuelve tal cual en una sola linea.
 * - Si no, se empaquetan palabras de forma voraz.
 * - Una palabra mas ancha que `anchoMaximo` queda sola en su linea (no se
 *   parte por caracteres).
 */
export function envolverTexto(texto: string, estilo: EstiloTexto, anchoMaximo: number): string[] {
  if (!texto) return [];
  if (medirTexto(texto, estilo).ancho <= anchoMaximo) return [texto];

  const palabras = texto.trim().split(/\s+/).filter(Boolean);
  if (palabras.length === 0) return [texto];

  const lineas: string[] = [];
  let actual = '';
  for (const palabra of palabras) {
    const tentativa = actual ? `${actual} ${palabra}` : palabra;
    if (!actual || medirTexto(tentativa, estilo).ancho <= anchoMaximo) {
      actual = tentativa;
      continue;
    }
    lineas.push(actual);
    actual = palabra;
  }
  if (actual) lineas.push(actual);
  return lineas;
}

/** Alto del bloque: suma de lineas + interlineado entre ellas. */
export function medirBloque(lineas: readonly string[], estilo: EstiloTexto, interlineado: number) {
  if (lineas.length === 0) return 0;
  const altos = lineas.reduce((total, linea) => total + medirTexto(linea, estilo).alto, 0);
  return altos + (lineas.length - 1) * interlineado;
}
