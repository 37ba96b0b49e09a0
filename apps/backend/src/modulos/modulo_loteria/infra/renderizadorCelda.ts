/**
 * Render de una celda: imagen ajustada por aspecto sobre fondo blanco y
 * leyenda envuelta, centrada y con contorno anclada al borde inferior.
 *
 * Una sola implementacion para tablas y baraja; la diferencia (borde doble y
 * banda de leyenda reservada) la decide `EstiloCelda`.
 */
import sharp, { type OverlayOptions } from 'sharp';
import { log } from '../../../infraestructura/logging/logger';
import {
  envolverTexto,
  medirBloque,
  medirTexto,
  type EstiloTexto,
  type FuenteMedible
} from '../domain/textoLayout';
import type {
  ColorRgb,
  FallaRecurso,
  ImagenLoteria,
  OperacionTexto,
  Rect,
  TipoPagina
} from '../shared/tiposLoteria';

export interface BordeCelda {
  anchoExterior: number;
  insetInterior: number;
  anchoInterior: number;
  color: ColorRgb;
}

export interface EstiloCelda {
  fuente: FuenteMedible;
  tamanoFuente: number;
  anchoContorno: number;
  colorRelleno: ColorRgb;
  colorContorno: ColorRgb;
  fondo: ColorRgb;
  paddingInferior: number;
  paddingLateral: number;
  interlineado: number;
  /** Solo baraja: marco doble alrededor de la celda. */
  borde: BordeCelda | null;
  /** Alto reservado para la leyenda fuera del area de imagen (0 = flota sobre la imagen). */
  altoBandaLeyenda: number;
}

export interface ContextoCelda {
  tipoPagina: TipoPagina;
  numeroPagina: number;
  posicion: number;
}

export interface CeldaRenderizada {
  /** Pixeles RGB crudos de `celda.ancho x celda.alto`; null si la imagen fallo. */
  raster: Buffer | null;
  textos: OperacionTexto[];
  falla?: FallaRecurso;
}

export interface AjusteAspecto {
  ancho: number;
  alto: number;
  offsetX: number;
  offsetY: number;
}

/**
 * Escala `min(anchoObj/ancho, altoObj/alto)`; el resultado cabe en el
 * objetivo, toca al menos un borde y queda centrado. La comparacion se hace
 * con productos enteros para que el borde limitante quede exacto.
 */
export function ajustarAspecto(ancho: number, alto: number, anchoObjetivo: number, altoObjetivo: number): AjusteAspecto {
  if (ancho <= 0 || alto <= 0 || anchoObjetivo <= 0 || altoObjetivo <= 0) {
    throw new RangeError(`Dimensiones invalidas: ${ancho}x${alto} -> ${anchoObjetivo}x${altoObjetivo}`);
  }
  const limitaAncho = ancho * altoObjetivo >= alto * anchoObjetivo;
  const nuevoAncho = limitaAncho ? anchoObjetivo : Math.min(anchoObjetivo, Math.max(1, Math.floor((ancho * altoObjetivo) / alto)));
  const nuevoAlto = limitaAncho ? Math.min(altoObjetivo, Math.max(1, Math.floor((alto * anchoObjetivo) / ancho))) : altoObjetivo;
  return {
    ancho: nuevoAncho,
    alto: nuevoAlto,
    offsetX: Math.floor((anchoObjetivo - nuevoAncho) / 2),
    offsetY: Math.floor((altoObjetivo - nuevoAlto) / 2)
  };
}

/** Area de imagen relativa a la celda. */
export function calcularAreaImagen(ancho: number, alto: number, estilo: Pick<EstiloCelda, 'borde' | 'altoBandaLeyenda'>): Rect {
  const inset = estilo.borde ? estilo.borde.insetInterior + estilo.borde.anchoInterior : 0;
  return {
    x: inset,
    y: inset,
    ancho: ancho - 2 * inset,
    alto: alto - 2 * inset - estilo.altoBandaLeyenda
  };
}

/**
 * Texto con contorno: copias desplazadas en todo el vecindario
 * `[-ancho, ancho]^2` (excepto el centro) y encima el relleno.
 */
export function operacionesContorno(
  texto: string,
  x: number,
  y: number,
  tamano: number,
  anchoContorno: number,
  colorContorno: ColorRgb,
  colorRelleno: ColorRgb
): OperacionTexto[] {
  const operaciones: OperacionTexto[] = [];
  for (let dx = -anchoContorno; dx <= anchoContorno; dx += 1) {
    for (let dy = -anchoContorno; dy <= anchoContorno; dy += 1) {
      if (dx === 0 && dy === 0) continue;
      operaciones.push({ texto, x: x + dx, y: y + dy, tamano, color: colorContorno });
    }
  }
  operaciones.push({ texto, x, y, tamano, color: colorRelleno });
  return operaciones;
}

/**
 * Leyenda en coordenadas de pagina: el bloque termina `paddingInferior` px
 * arriba del borde inferior de la celda y cada linea va centrada.
 */
export function componerLeyenda(texto: string, celda: Rect, estilo: EstiloCelda): OperacionTexto[] {
  const estiloTexto: EstiloTexto = { fuente: estilo.fuente, tamano: estilo.tamanoFuente };
  const lineas = envolverTexto(texto, estiloTexto, celda.ancho - 2 * estilo.paddingLateral);
  if (lineas.length === 0) return [];

  const altoBloque = medirBloque(lineas, estiloTexto, estilo.interlineado);
  let y = celda.y + celda.alto - estilo.paddingInferior - altoBloque;
  const operaciones: OperacionTexto[] = [];
  for (const linea of lineas) {
    const medida = medirTexto(linea, estiloTexto);
    const x = celda.x + Math.floor((celda.ancho - medida.ancho) / 2);
    operaciones.push(
      ...operacionesContorno(
        linea,
        x,
        Math.floor(y),
        estilo.tamanoFuente,
        estilo.anchoContorno,
        estilo.colorContorno,
        estilo.colorRelleno
      )
    );
    y += medida.alto + estilo.interlineado;
  }
  return operaciones;
}

function capasBorde(ancho: number, alto: number, borde: BordeCelda, fondo: ColorRgb): OverlayOptions[] {
  const rectangulo = (inset: number, color: ColorRgb): OverlayOptions => ({
    input: {
      create: {
        width: Math.max(1, ancho - 2 * inset),
        height: Math.max(1, alto - 2 * inset),
        channels: 3,
        background: color
      }
    },
    left: inset,
    top: inset
  });

  const finInterior = borde.insetInterior + borde.anchoInterior;
  return [
    rectangulo(0, borde.color),
    rectangulo(borde.anchoExterior, fondo),
    rectangulo(borde.insetInterior, borde.color),
    rectangulo(finInterior, fondo)
  ];
}

async function redimensionar(imagen: ImagenLoteria, ajuste: AjusteAspecto, fondo: ColorRgb) {
  const { data, info } = await sharp(imagen.contenido)
    .rotate()
    .flatten({ background: fondo })
    .toColourspace('srgb')
    .resize(ajuste.ancho, ajuste.alto, { fit: 'fill', kernel: 'lanczos3' })
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== 3 || info.width !== ajuste.ancho || info.height !== ajuste.alto) {
    throw new Error(`Raster inesperado ${info.width}x${info.height}x${info.channels}`);
  }
  return data;
}

export async function renderizarCelda(
  imagen: ImagenLoteria,
  leyenda: string,
  celda: Rect,
  estilo: EstiloCelda,
  contexto: ContextoCelda
): Promise<CeldaRenderizada> {
  try {
    const area = calcularAreaImagen(celda.ancho, celda.alto, estilo);
    const ajuste = ajustarAspecto(imagen.ancho, imagen.alto, area.ancho, area.alto);
    const pixeles = await redimensionar(imagen, ajuste, estilo.fondo);

    const capas: OverlayOptions[] = estilo.borde ? capasBorde(celda.ancho, celda.alto, estilo.borde, estilo.fondo) : [];
    capas.push({
      input: pixeles,
      raw: { width: ajuste.ancho, height: ajuste.alto, channels: 3 },
      left: area.x + ajuste.offsetX,
      top: area.y + ajuste.offsetY
    });

    const raster = await sharp({
      create: { width: celda.ancho, height: celda.alto, channels: 3, background: estilo.fondo }
    })
      .composite(capas)
      .removeAlpha()
      .raw()
      .toBuffer();

    return { raster, textos: componerLeyenda(leyenda, celda, estilo) };
  } catch (error) {
    const mensaje = error instanceof Error ? error.message : String(error);
    log('warn', 'Imagen no procesable; la celda queda en blanco', {
      imagen: imagen.id,
      ...contexto,
      motivo: mensaje
    });
    return {
      raster: null,
      textos: [],
      falla: {
        codigo: 'IMAGEN_NO_DECODIFICABLE',
        mensaje,
        idImagen: imagen.id,
        ...contexto
      }
    };
  }
}
