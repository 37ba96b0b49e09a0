/**
 * Use case: Generar Loteria
 *
 * Orquesta la generacion completa: validar parametros, decodificar el pool,
 * sortear tablas, paginar la baraja y ensamblar el PDF.
 *
 * Responsabilidad: coordinar domain + infra sin logica de rendering.
 * Los errores de configuracion y de pool se lanzan antes de renderizar.
 */
import { crearAleatorio, type Aleatorio } from '../../../../compartido/utilidades/aleatoriedad';
import { configuracion } from '../../../../configuracion';
import { log } from '../../../../infraestructura/logging/logger';
import { CUADRICULA_CARTA, IMAGENES_POR_TABLA, type EspecificacionCuadricula } from '../../domain/cuadricula';
import { ErrorConfiguracion, ErrorImagenesInsuficientes } from '../../domain/erroresLoteria';
import { muestrearTablas } from '../../domain/muestreadorTablas';
import { paginarBaraja } from '../../domain/paginadorBaraja';
import { cargarPool } from '../../infra/decodificadorImagenes';
import { ensamblarLoteria } from '../../infra/ensambladorDocumento';
import { estrategiasPredeterminadas, type EstrategiaFuente } from '../../infra/fuentes';
import type {
  EntradaImagen,
  EventoProgreso,
  ParametrosGeneracion,
  ResultadoGeneracion
} from '../../shared/tiposLoteria';
import { esquemaParametrosGeneracion } from '../../validacionesLoteria';

export interface OpcionesGeneracion {
  /** Reemplaza la fuente derivada de `semilla`. */
  aleatorio?: Aleatorio;
  signal?: AbortSignal;
  estrategiasFuente?: readonly EstrategiaFuente[];
  espec?: EspecificacionCuadricula;
  calidadJpeg?: number;
  alProgresar?: (evento: EventoProgreso) => void;
}

function validarParametros(parametros: ParametrosGeneracion): ParametrosGeneracion {
  const resultado = esquemaParametrosGeneracion.safeParse(parametros);
  if (!resultado.success) {
    throw new ErrorConfiguracion('Parametros de generacion invalidos', resultado.error.flatten());
  }
  return resultado.data;
}

export async function generarLoteria(
  entradas: readonly EntradaImagen[],
  parametros: ParametrosGeneracion,
  opciones: OpcionesGeneracion = {}
): Promise<ResultadoGeneracion> {
  const params = validarParametros(parametros);
  if (entradas.length < IMAGENES_POR_TABLA) {
    throw new ErrorImagenesInsuficientes(entradas.length);
  }

  const { pool, fallas: fallasPool } = await cargarPool(entradas);
  if (pool.length < IMAGENES_POR_TABLA) {
    throw new ErrorImagenesInsuficientes(pool.length);
  }

  const aleatorio = opciones.aleatorio ?? crearAleatorio(params.semilla);
  const tablas = muestrearTablas(pool, params.cantidadTablas, params.titulo, aleatorio);
  const paginasBaraja = params.incluirBaraja ? paginarBaraja(pool) : undefined;

  log('info', 'Generando loteria', {
    imagenes: pool.length,
    tablas: tablas.length,
    paginasBaraja: paginasBaraja?.length ?? 0,
    semilla: params.semilla ?? null
  });

  const documento = await ensamblarLoteria(paginasBaraja, tablas, params.titulo, params.tamanoFuenteEtiqueta, {
    espec: opciones.espec ?? CUADRICULA_CARTA,
    estrategiasFuente: opciones.estrategiasFuente ?? estrategiasPredeterminadas(configuracion.rutaFuenteTtf),
    calidadJpeg: opciones.calidadJpeg ?? configuracion.calidadJpeg,
    prefijoFolio: params.prefijoFolio,
    signal: opciones.signal,
    alProgresar: opciones.alProgresar
  });

  const fallas = [...fallasPool, ...documento.fallas];
  log(fallas.length > 0 ? 'warn' : 'ok', 'Loteria generada', {
    paginas: documento.totalPaginas,
    fallas: fallas.length,
    fuente: documento.fuente
  });

  return {
    pdfBytes: documento.pdfBytes,
    totalPaginas: documento.totalPaginas,
    paginasBaraja: documento.paginasBaraja,
    tablas: tablas.map((tabla) => ({ folio: tabla.folio, imagenes: tabla.imagenes.map((imagen) => imagen.id) })),
    fallas
  };
}
