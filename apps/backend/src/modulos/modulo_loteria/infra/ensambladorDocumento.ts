/**
 * Ensamblado del PDF final.
 *
 * Orden fijo: paginas de baraja (si aplica) y despues tablas por folio. Cada
 * pagina se compone, se agrega y se libera antes de la siguiente; el raster
 * se dibuja a pagina completa y los textos van encima como texto vectorial
 * con la misma fuente que los midio.
 */
import { PDFDocument, rgb, type PDFPage } from 'pdf-lib';
import { log, logError } from '../../../infraestructura/logging/logger';
import { CUADRICULA_CARTA, type EspecificacionCuadricula } from '../domain/cuadricula';
import { ErrorEnsamblado, ErrorGeneracionCancelada } from '../domain/erroresLoteria';
import {
  PUNTOS_POR_PIXEL,
  type EventoProgreso,
  type FallaRecurso,
  type OperacionTexto,
  type PaginaBaraja,
  type PaginaRenderizada,
  type Tabla,
  type TipoPagina
} from '../shared/tiposLoteria';
import { componerPaginaBaraja, componerPaginaTabla, type ContextoComposicion } from './compositorPagina';
import { estrategiasPredeterminadas, resolverFuente, type EstrategiaFuente, type FuentePdf } from './fuentes';

export interface OpcionesEnsamblado {
  espec?: EspecificacionCuadricula;
  estrategiasFuente?: readonly EstrategiaFuente[];
  calidadJpeg?: number;
  prefijoFolio?: string;
  signal?: AbortSignal;
  alProgresar?: (evento: EventoProgreso) => void;
}

export interface DocumentoEnsamblado {
  pdfBytes: Buffer;
  totalPaginas: number;
  paginasBaraja: number;
  paginasTabla: number;
  fuente: string;
  fallas: FallaRecurso[];
}

interface TrabajoPagina {
  tipo: TipoPagina;
  numero: number;
  componer: () => Promise<PaginaRenderizada>;
}

function listarTrabajos(paginasBaraja: readonly PaginaBaraja[], tablas: readonly Tabla[], ctx: ContextoComposicion): TrabajoPagina[] {
  return [
    ...paginasBaraja.map((pagina) => ({
      tipo: 'baraja' as const,
      numero: pagina.numero,
      componer: () => componerPaginaBaraja(pagina, ctx)
    })),
    ...tablas.map((tabla) => ({
      tipo: 'tabla' as const,
      numero: tabla.folio,
      componer: () => componerPaginaTabla(tabla, ctx)
    }))
  ];
}

/**
 * Produce paginas una por una. Una pagina que no se puede componer se
 * registra como falla y se omite; las demas continuan.
 */
async function* producirPaginas(trabajos: readonly TrabajoPagina[], fallas: FallaRecurso[], signal?: AbortSignal) {
  let emitidas = 0;
  for (const trabajo of trabajos) {
    if (signal?.aborted) throw new ErrorGeneracionCancelada(emitidas);
    let pagina: PaginaRenderizada;
    try {
      pagina = await trabajo.componer();
    } catch (error) {
      const mensaje = error instanceof Error ? error.message : String(error);
      logError('Pagina omitida', error, { tipo: trabajo.tipo, numero: trabajo.numero });
      fallas.push({
        codigo: 'PAGINA_NO_RENDERIZADA',
        mensaje,
        tipoPagina: trabajo.tipo,
        numeroPagina: trabajo.numero
      });
      continue;
    }
    emitidas += 1;
    yield pagina;
  }
}

function dibujarTexto(pagina: PDFPage, fuente: FuentePdf, operacion: OperacionTexto, altoPagina: number) {
  const tamano = operacion.tamano * PUNTOS_POR_PIXEL;
  const lineaBase = operacion.y + fuente.ascenso(operacion.tamano);
  pagina.drawText(fuente.normalizar(operacion.texto), {
    x: operacion.x * PUNTOS_POR_PIXEL,
    y: (altoPagina - lineaBase) * PUNTOS_POR_PIXEL,
    size: tamano,
    font: fuente.pdfFont,
    color: rgb(operacion.color.r / 255, operacion.color.g / 255, operacion.color.b / 255)
  });
}

async function agregarPagina(pdfDoc: PDFDocument, fuente: FuentePdf, renderizada: PaginaRenderizada) {
  const imagen = await pdfDoc.embedJpg(renderizada.raster);
  const ancho = renderizada.ancho * PUNTOS_POR_PIXEL;
  const alto = renderizada.alto * PUNTOS_POR_PIXEL;
  const pagina = pdfDoc.addPage([ancho, alto]);
  pagina.drawImage(imagen, { x: 0, y: 0, width: ancho, height: alto });
  for (const operacion of renderizada.textos) dibujarTexto(pagina, fuente, operacion, renderizada.alto);
}

export async function ensamblarLoteria(
  paginasBaraja: readonly PaginaBaraja[] | undefined,
  tablas: readonly Tabla[],
  titulo: string,
  tamanoFuenteEtiqueta: number,
  opciones: OpcionesEnsamblado = {}
): Promise<DocumentoEnsamblado> {
  const espec = opciones.espec ?? CUADRICULA_CARTA;
  // Sin metadatos de fecha/productor: misma entrada y semilla => mismos bytes.
  const pdfDoc = await PDFDocument.create({ updateMetadata: false });
  if (titulo) pdfDoc.setTitle(titulo);

  const fuente = await resolverFuente(pdfDoc, opciones.estrategiasFuente ?? estrategiasPredeterminadas());
  log('info', 'Fuente de etiquetas resuelta', { origen: fuente.origen });

  const ctx: ContextoComposicion = {
    espec,
    fuente,
    tamanoFuenteEtiqueta,
    calidadJpeg: opciones.calidadJpeg ?? 92,
    prefijoFolio: opciones.prefijoFolio ?? 'Tabla'
  };
  const trabajos = listarTrabajos(paginasBaraja ?? [], tablas, ctx);
  const fallas: FallaRecurso[] = [];
  const conteo = { baraja: 0, tabla: 0 };
  let celdasRenderizadas = 0;

  for await (const renderizada of producirPaginas(trabajos, fallas, opciones.signal)) {
    try {
      await agregarPagina(pdfDoc, fuente, renderizada);
    } catch (error) {
      throw new ErrorEnsamblado(`No se pudo agregar la pagina ${renderizada.tipo} ${renderizada.numero}`, error);
    }
    fallas.push(...renderizada.fallas);
    conteo[renderizada.tipo] += 1;
    celdasRenderizadas += renderizada.celdasRenderizadas;
    opciones.alProgresar?.({
      tipo: renderizada.tipo,
      numero: renderizada.numero,
      completadas: conteo.baraja + conteo.tabla,
      total: trabajos.length
    });
  }

  const totalPaginas = conteo.baraja + conteo.tabla;
  if (totalPaginas === 0) {
    throw new ErrorEnsamblado('No se pudo renderizar ninguna pagina', fallas[0]?.mensaje);
  }
  // Todas las celdas de todas las paginas fallaron.
  if (celdasRenderizadas === 0) {
    throw new ErrorEnsamblado('Ninguna imagen se pudo renderizar', fallas[0]?.mensaje);
  }

  let bytes: Uint8Array;
  try {
    bytes = await pdfDoc.save();
  } catch (error) {
    throw new ErrorEnsamblado('No se pudo serializar el PDF', error);
  }

  return {
    pdfBytes: Buffer.from(bytes),
    totalPaginas,
    paginasBaraja: conteo.baraja,
    paginasTabla: conteo.tabla,
    fuente: fuente.origen,
    fallas
  };
}
