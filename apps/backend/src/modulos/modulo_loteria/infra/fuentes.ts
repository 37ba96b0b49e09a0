/**
 * Resolucion de la fuente de titulos y leyendas.
 *
 * Cadena ordenada de estrategias: la primera que entrega una fuente gana.
 * Por defecto: archivo configurado -> fuentes del sistema -> Helvetica estandar.
 * La misma `PDFFont` se usa para medir y para dibujar, asi que las lineas
 * envueltas coinciden con lo impreso.
 */
import fs from 'node:fs/promises';
import fontkit from '@pdf-lib/fontkit';
import { StandardFonts, type PDFDocument, type PDFFont } from 'pdf-lib';
import { sanitizarTextoPdf } from '../../../compartido/utilidades/texto';
import { log } from '../../../infraestructura/logging/logger';
import type { FuenteMedible } from '../domain/textoLayout';

// Nombre fijo: pdf-lib agrega un sufijo aleatorio si no se indica uno.
const NOMBRE_FUENTE_EMBEBIDA = 'LoteriaEtiquetas';

const RUTAS_FUENTES_SISTEMA = [
  '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf',
  '/usr/share/fonts/truetype/liberation/LiberationSans-Bold.ttf',
  '/usr/share/fonts/liberation-sans/LiberationSans-Bold.ttf',
  '/Library/Fonts/Arial Bold.ttf',
  '/System/Library/Fonts/Supplemental/Arial Bold.ttf',
  'C:\\Windows\\Fonts\\arialbd.ttf'
];

export interface EstrategiaFuente {
  nombre: string;
  cargar(pdfDoc: PDFDocument): Promise<PDFFont | null>;
}

export class FuentePdf implements FuenteMedible {
  private readonly soportados: Set<number>;

  constructor(
    readonly pdfFont: PDFFont,
    readonly origen: string
  ) {
    this.soportados = new Set(pdfFont.getCharacterSet());
  }

  /** Texto tal como se dibuja: simbolos no codificables pasan a `?`. */
  normalizar(texto: string): string {
    let salida = '';
    for (const caracter of sanitizarTextoPdf(texto)) {
      const codigo = caracter.codePointAt(0) ?? 0;
      salida += this.soportados.has(codigo) ? caracter : '?';
    }
    return salida;
  }

  anchoTexto(texto: string, tamano: number): number {
    return this.pdfFont.widthOfTextAtSize(this.normalizar(texto), tamano);
  }

  altoLinea(tamano: number): number {
    return this.pdfFont.heightAtSize(tamano);
  }

  /** Distancia de la parte superior de la linea a la linea base. */
  ascenso(tamano: number): number {
    return this.pdfFont.heightAtSize(tamano, { descender: false });
  }
}

async function existeArchivo(ruta: string) {
  try {
    const info = await fs.stat(ruta);
    return info.isFile();
  } catch {
    return false;
  }
}

export function estrategiaArchivo(ruta: string): EstrategiaFuente {
  return {
    nombre: `archivo:${ruta}`,
    async cargar(pdfDoc) {
      if (!ruta || !(await existeArchivo(ruta))) return null;
      const bytes = await fs.readFile(ruta);
      pdfDoc.registerFontkit(fontkit);
      return pdfDoc.embedFont(bytes, { subset: true, customName: NOMBRE_FUENTE_EMBEBIDA });
    }
  };
}

export function estrategiaEstandar(fuente: StandardFonts = StandardFonts.HelveticaBold): EstrategiaFuente {
  return {
    nombre: `estandar:${fuente}`,
    cargar: (pdfDoc) => pdfDoc.embedFont(fuente)
  };
}

export function estrategiasPredeterminadas(rutaConfigurada?: string): EstrategiaFuente[] {
  const estrategias: EstrategiaFuente[] = [];
  if (rutaConfigurada) estrategias.push(estrategiaArchivo(rutaConfigurada));
  for (const ruta of RUTAS_FUENTES_SISTEMA) estrategias.push(estrategiaArchivo(ruta));
  estrategias.push(estrategiaEstandar());
  return estrategias;
}

export async function resolverFuente(pdfDoc: PDFDocument, estrategias: readonly EstrategiaFuente[]): Promise<FuentePdf> {
  for (const estrategia of estrategias) {
    let fuente: PDFFont | null = null;
    try {
      fuente = await estrategia.cargar(pdfDoc);
    } catch (error) {
      log('warn', 'Estrategia de fuente fallida', {
        estrategia: estrategia.nombre,
        motivo: error instanceof Error ? error.message : String(error)
      });
    }
    if (fuente) return new FuentePdf(fuente, estrategia.nombre);
  }
  // La estrategia estandar no depende del sistema; solo falta si se omitio.
  return new FuentePdf(await pdfDoc.embedFont(StandardFonts.HelveticaBold), `estandar:${StandardFonts.HelveticaBold}`);
}
