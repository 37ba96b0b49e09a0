/**
 * Tipos compartidos para el dominio de generacion de loterias.
 *
 * Todas las coordenadas y tamanos estan en pixeles de la pagina a 300 DPI,
 * con origen en la esquina superior izquierda.
 */

/** Puntos PDF por pixel a 300 DPI (72 / 300). */
export const PUNTOS_POR_PIXEL = 72 / 300;

export interface ColorRgb {
  r: number;
  g: number;
  b: number;
}

export const BLANCO: ColorRgb = { r: 255, g: 255, b: 255 };
export const NEGRO: ColorRgb = { r: 0, g: 0, b: 0 };

export interface Rect {
  x: number;
  y: number;
  ancho: number;
  alto: number;
}

/** Entrada cruda que entrega el colaborador externo (CLI, HTTP). */
export interface EntradaImagen {
  /** Nombre de archivo sin extension; se imprime tal cual como leyenda. */
  nombre: string;
  contenido: Buffer;
}

/** Imagen decodificada del pool; inmutable durante la corrida. */
export interface ImagenLoteria {
  readonly id: string;
  readonly contenido: Buffer;
  readonly ancho: number;
  readonly alto: number;
}

export type Pool = readonly ImagenLoteria[];

export interface PaginaBaraja {
  /** 1-based. */
  numero: number;
  imagenes: readonly ImagenLoteria[];
}

export interface Tabla {
  /** 1-based, consecutivo. */
  folio: number;
  titulo: string;
  imagenes: readonly ImagenLoteria[];
}

export type TipoPagina = 'baraja' | 'tabla';

/** Texto a dibujar sobre el raster; `y` es la parte superior de la linea. */
export interface OperacionTexto {
  texto: string;
  x: number;
  y: number;
  tamano: number;
  color: ColorRgb;
}

export interface FallaRecurso {
  codigo: 'IMAGEN_NO_DECODIFICABLE' | 'PAGINA_NO_RENDERIZADA';
  mensaje: string;
  idImagen?: string;
  tipoPagina?: TipoPagina;
  numeroPagina?: number;
  posicion?: number;
}

export interface PaginaRenderizada {
  tipo: TipoPagina;
  /** Numero de pagina de baraja o folio de la tabla. */
  numero: number;
  ancho: number;
  alto: number;
  /** Raster completo de la pagina (JPEG). */
  raster: Buffer;
  textos: OperacionTexto[];
  /** Celdas con imagen; las que fallaron quedan en blanco. */
  celdasRenderizadas: number;
  fallas: FallaRecurso[];
}

export interface ParametrosGeneracion {
  cantidadTablas: number;
  titulo: string;
  tamanoFuenteEtiqueta: number;
  incluirBaraja: boolean;
  /** Texto previo al folio ("Tabla #01"). */
  prefijoFolio?: string;
  semilla?: number | string;
}

export interface EventoProgreso {
  tipo: TipoPagina;
  numero: number;
  /** Paginas emitidas hasta ahora / total esperado. */
  completadas: number;
  total: number;
}

export interface ResultadoGeneracion {
  pdfBytes: Buffer;
  totalPaginas: number;
  paginasBaraja: number;
  tablas: Array<{ folio: number; imagenes: string[] }>;
  fallas: FallaRecurso[];
}
