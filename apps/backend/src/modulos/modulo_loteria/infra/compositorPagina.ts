/**
 * Composicion de paginas completas (tabla o baraja) a partir de celdas.
 *
 * Responsabilidad: ubicar celdas, titulo y folio; producir el raster JPEG de
 * la pagina y las operaciones de texto que van encima.
 * Limites: no conoce pdf-lib; el ensamblador decide como dibujar los textos.
 */
import sharp, { type OverlayOptions } from 'sharp';
import { calcularCeldasBaraja, calcularCeldasTabla, IMAGENES_POR_TABLA, type EspecificacionCuadricula } from '../domain/cuadricula';
import { medirTexto, type FuenteMedible } from '../domain/textoLayout';
import {
  BLANCO,
  NEGRO,
  type FallaRecurso,
  type OperacionTexto,
  type PaginaBaraja,
  type PaginaRenderizada,
  type Rect,
  type Tabla,
  type TipoPagina
} from '../shared/tiposLoteria';
import { renderizarCelda, type CeldaRenderizada, type EstiloCelda } from './renderizadorCelda';

export interface ContextoComposicion {
  espec: EspecificacionCuadricula;
  fuente: FuenteMedible;
  tamanoFuenteEtiqueta: number;
  calidadJpeg: number;
  prefijoFolio: string;
}

export function formatearFolio(folio: number, prefijo = 'Tabla'): string {
  return `${prefijo} #${String(folio).padStart(2, '0')}`;
}

function estiloTabla(ctx: ContextoComposicion): EstiloCelda {
  const { espec } = ctx;
  return {
    fuente: ctx.fuente,
    tamanoFuente: ctx.tamanoFuenteEtiqueta,
    anchoContorno: espec.anchoContorno,
    colorRelleno: BLANCO,
    colorContorno: NEGRO,
    fondo: BLANCO,
    paddingInferior: espec.paddingInferiorEtiqueta,
    paddingLateral: espec.paddingLateralEtiqueta,
    interlineado: espec.interlineado,
    borde: null,
    altoBandaLeyenda: 0
  };
}

function estiloBaraja(ctx: ContextoComposicion): EstiloCelda {
  const { bordeBaraja } = ctx.espec;
  return {
    ...estiloTabla(ctx),
    paddingLateral: ctx.espec.paddingLateralEtiqueta + bordeBaraja.insetInterior + bordeBaraja.anchoInterior,
    borde: { ...bordeBaraja, color: NEGRO },
    altoBandaLeyenda: ctx.espec.altoBandaLeyenda
  };
}

/** Titulo centrado y folio alineado a la derecha, ambos en el margen superior. */
export function componerEncabezado(tabla: Tabla, ctx: ContextoComposicion): OperacionTexto[] {
  const { espec, fuente } = ctx;
  const y = Math.floor(espec.margenSuperior / 2);
  const operaciones: OperacionTexto[] = [];

  if (tabla.titulo) {
    const medida = medirTexto(tabla.titulo, { fuente, tamano: espec.tamanoTitulo });
    operaciones.push({
      texto: tabla.titulo,
      x: Math.floor((espec.anchoPagina - medida.ancho) / 2),
      y,
      tamano: espec.tamanoTitulo,
      color: NEGRO
    });
  }

  const folio = formatearFolio(tabla.folio, ctx.prefijoFolio);
  const medidaFolio = medirTexto(folio, { fuente, tamano: espec.tamanoFolio });
  operaciones.push({
    texto: folio,
    x: Math.floor(espec.anchoPagina - espec.margenDerecho - medidaFolio.ancho),
    y,
    tamano: espec.tamanoFolio,
    color: NEGRO
  });
  return operaciones;
}

async function rasterizarPagina(celdas: Rect[], renders: CeldaRenderizada[], ctx: ContextoComposicion) {
  const capas: OverlayOptions[] = [];
  renders.forEach((render, indice) => {
    const celda = celdas[indice];
    if (!render.raster || !celda) return;
    capas.push({
      input: render.raster,
      raw: { width: celda.ancho, height: celda.alto, channels: 3 },
      left: celda.x,
      top: celda.y
    });
  });

  return sharp({
    create: { width: ctx.espec.anchoPagina, height: ctx.espec.altoPagina, channels: 3, background: BLANCO }
  })
    .composite(capas)
    .removeAlpha()
    .jpeg({ quality: ctx.calidadJpeg, chromaSubsampling: '4:4:4' })
    .toBuffer();
}

async function componerPagina(
  tipo: TipoPagina,
  numero: number,
  imagenes: Tabla['imagenes'],
  celdas: Rect[],
  estilo: EstiloCelda,
  encabezado: OperacionTexto[],
  ctx: ContextoComposicion
): Promise<PaginaRenderizada> {
  // Secuencial: sharp ya paraleliza internamente y asi se acota la memoria.
  const renders: CeldaRenderizada[] = [];
  for (const [posicion, imagen] of imagenes.entries()) {
    const celda = celdas[posicion];
    if (!celda) break;
    renders.push(await renderizarCelda(imagen, imagen.id, celda, estilo, { tipoPagina: tipo, numeroPagina: numero, posicion }));
  }

  const fallas: FallaRecurso[] = [];
  for (const render of renders) if (render.falla) fallas.push(render.falla);

  const raster = await rasterizarPagina(celdas, renders, ctx);
  return {
    tipo,
    numero,
    ancho: ctx.espec.anchoPagina,
    alto: ctx.espec.altoPagina,
    raster,
    textos: [...encabezado, ...renders.flatMap((render) => render.textos)],
    celdasRenderizadas: renders.filter((render) => render.raster !== null).length,
    fallas
  };
}

export async function componerPaginaTabla(tabla: Tabla, ctx: ContextoComposicion): Promise<PaginaRenderizada> {
  if (tabla.imagenes.length !== IMAGENES_POR_TABLA) {
    throw new RangeError(`La tabla ${tabla.folio} tiene ${tabla.imagenes.length} imagenes; se esperaban ${IMAGENES_POR_TABLA}`);
  }
  return componerPagina(
    'tabla',
    tabla.folio,
    tabla.imagenes,
    calcularCeldasTabla(ctx.espec),
    estiloTabla(ctx),
    componerEncabezado(tabla, ctx),
    ctx
  );
}

/** Pagina de baraja: las celdas sobrantes de la ultima pagina quedan en blanco. */
export async function componerPaginaBaraja(pagina: PaginaBaraja, ctx: ContextoComposicion): Promise<PaginaRenderizada> {
  if (pagina.imagenes.length === 0 || pagina.imagenes.length > IMAGENES_POR_TABLA) {
    throw new RangeError(`La pagina de baraja ${pagina.numero} tiene ${pagina.imagenes.length} imagenes`);
  }
  return componerPagina(
    'baraja',
    pagina.numero,
    pagina.imagenes,
    calcularCeldasBaraja(ctx.espec),
    estiloBaraja(ctx),
    [],
    ctx
  );
}
