/**
 * generarLoteria.test
 *
 * Pipeline completo: pool -> tablas/baraja -> PDF. Se usa Helvetica estandar
 * para no depender de las fuentes instaladas en la maquina.
 */
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';
import { describe, expect, it, vi } from 'vitest';
import { generarLoteria } from '../src/modulos/modulo_loteria/application/usecases/generarLoteria';
import {
  ErrorConfiguracion,
  ErrorEnsamblado,
  ErrorGeneracionCancelada,
  ErrorImagenesInsuficientes
} from '../src/modulos/modulo_loteria/domain/erroresLoteria';
import { ensamblarLoteria } from '../src/modulos/modulo_loteria/infra/ensambladorDocumento';
import { estrategiaEstandar } from '../src/modulos/modulo_loteria/infra/fuentes';
import type { ParametrosGeneracion } from '../src/modulos/modulo_loteria/shared/tiposLoteria';
import { crearEntradas, crearPoolFalso } from './utils/imagenes';

const opciones = { estrategiasFuente: [estrategiaEstandar()], calidadJpeg: 70 };

function parametros(cambios: Partial<ParametrosGeneracion> = {}): ParametrosGeneracion {
  return {
    cantidadTablas: 1,
    titulo: 'Lotería Prueba',
    tamanoFuenteEtiqueta: 32,
    incluirBaraja: false,
    semilla: 'prueba',
    ...cambios
  };
}

describe('generarLoteria', () => {
  it('16 imagenes y una tabla producen una pagina con las 16 imagenes', async () => {
    const entradas = await crearEntradas(16);

    const resultado = await generarLoteria(entradas, parametros(), opciones);

    expect(resultado.totalPaginas).toBe(1);
    expect(resultado.paginasBaraja).toBe(0);
    expect(resultado.fallas).toEqual([]);
    expect(resultado.tablas).toHaveLength(1);
    expect(resultado.tablas[0]?.folio).toBe(1);
    expect([...(resultado.tablas[0]?.imagenes ?? [])].sort()).toEqual(entradas.map((entrada) => entrada.nombre).sort());

    const pdf = await PDFDocument.load(resultado.pdfBytes);
    expect(pdf.getPageCount()).toBe(1);
    expect(pdf.getTitle()).toBe('Lotería Prueba');
    const { width, height } = pdf.getPage(0).getSize();
    expect(width).toBeCloseTo(612, 3);
    expect(height).toBeCloseTo(792, 3);
  });

  it('con baraja antepone las paginas de referencia (16 + 4)', async () => {
    const entradas = await crearEntradas(20);
    const eventos: string[] = [];

    const resultado = await generarLoteria(entradas, parametros({ cantidadTablas: 2, incluirBaraja: true }), {
      ...opciones,
      alProgresar: (evento) => eventos.push(`${evento.tipo}:${evento.numero}:${evento.completadas}/${evento.total}`)
    });

    expect(resultado.paginasBaraja).toBe(2);
    expect(resultado.totalPaginas).toBe(4);
    expect(eventos).toEqual(['baraja:1:1/4', 'baraja:2:2/4', 'tabla:1:3/4', 'tabla:2:4/4']);
    expect((await PDFDocument.load(resultado.pdfBytes)).getPageCount()).toBe(4);
  });

  it('la misma semilla produce bytes identicos', async () => {
    const entradas = await crearEntradas(18);

    const primero = await generarLoteria(entradas, parametros({ cantidadTablas: 2, semilla: 42 }), opciones);
    const segundo = await generarLoteria(entradas, parametros({ cantidadTablas: 2, semilla: 42 }), opciones);

    expect(segundo.tablas).toEqual(primero.tablas);
    expect(Buffer.compare(primero.pdfBytes, segundo.pdfBytes)).toBe(0);
  });

  it('una imagen ilegible se omite del pool y se reporta', async () => {
    const entradas = [...(await crearEntradas(16)), { nombre: 'rota', contenido: Buffer.from('sin formato') }];

    const resultado = await generarLoteria(entradas, parametros(), opciones);

    expect(resultado.totalPaginas).toBe(1);
    expect(resultado.fallas).toEqual([
      expect.objectContaining({ codigo: 'IMAGEN_NO_DECODIFICABLE', idImagen: 'rota' })
    ]);
    expect(resultado.tablas[0]?.imagenes).not.toContain('rota');
  });

  it('una imagen que falla al rasterizar deja su celda en blanco sin perder la pagina', async () => {
    // El encabezado PNG queda intacto: pasa la lectura de metadatos y falla al decodificar.
    const completa = await sharp({
      create: { width: 64, height: 64, channels: 3, background: { r: 128, g: 128, b: 128 }, noise: { type: 'gaussian', mean: 128, sigma: 40 } }
    })
      .png()
      .toBuffer();
    const cortada = { nombre: 'cortada', contenido: completa.subarray(0, Math.floor(completa.length / 2)) };
    const entradas = [...(await crearEntradas(16)), cortada];

    const resultado = await generarLoteria(entradas, parametros({ incluirBaraja: true }), opciones);

    expect(resultado.paginasBaraja).toBe(2);
    expect(resultado.totalPaginas).toBe(3);
    expect(resultado.fallas).toContainEqual(
      expect.objectContaining({
        codigo: 'IMAGEN_NO_DECODIFICABLE',
        idImagen: 'cortada',
        tipoPagina: 'baraja',
        numeroPagina: 2,
        posicion: 0
      })
    );
    expect(resultado.fallas.every((falla) => falla.codigo === 'IMAGEN_NO_DECODIFICABLE')).toBe(true);
  });

  it('cantidadTablas = 0 es un error de configuracion', async () => {
    const entradas = await crearEntradas(16);
    await expect(generarLoteria(entradas, parametros({ cantidadTablas: 0 }), opciones)).rejects.toBeInstanceOf(
      ErrorConfiguracion
    );
  });

  it('15 imagenes no alcanzan', async () => {
    const entradas = await crearEntradas(15);
    await expect(generarLoteria(entradas, parametros(), opciones)).rejects.toBeInstanceOf(ErrorImagenesInsuficientes);
  });

  it('si al decodificar quedan menos de 16 se rechaza', async () => {
    const entradas = [...(await crearEntradas(15)), { nombre: 'rota', contenido: Buffer.from('x') }];
    await expect(generarLoteria(entradas, parametros(), opciones)).rejects.toMatchObject({
      codigo: 'IMAGENES_INSUFICIENTES',
      disponibles: 15
    });
  });

  it('nombres repetidos no impiden la generacion', async () => {
    const entradas = await crearEntradas(16);
    const repetidas = [...entradas, { nombre: 'carta 01', contenido: entradas[1]?.contenido ?? Buffer.alloc(0) }];

    const resultado = await generarLoteria(repetidas, parametros({ cantidadTablas: 1, incluirBaraja: true }), opciones);

    expect(resultado.paginasBaraja).toBe(2);
    expect(resultado.fallas).toEqual([]);
  });

  it('se cancela entre paginas cuando la senal se aborta', async () => {
    const entradas = await crearEntradas(16);
    const controlador = new AbortController();
    const alProgresar = vi.fn(() => controlador.abort());

    await expect(
      generarLoteria(entradas, parametros({ cantidadTablas: 3 }), { ...opciones, signal: controlador.signal, alProgresar })
    ).rejects.toBeInstanceOf(ErrorGeneracionCancelada);
    expect(alProgresar).toHaveBeenCalledTimes(1);
  });
});

describe('ensamblarLoteria', () => {
  it('sin ninguna celda renderizada en todo el documento es un error de ensamblado', async () => {
    const tabla = { folio: 1, titulo: 'Vacia', imagenes: crearPoolFalso(16) };

    const promesa = ensamblarLoteria(undefined, [tabla], 'Vacia', 32, { estrategiasFuente: [estrategiaEstandar()] });

    await expect(promesa).rejects.toBeInstanceOf(ErrorEnsamblado);
    await expect(promesa).rejects.toMatchObject({ codigo: 'ENSAMBLADO_FALLIDO', estadoHttp: 500 });
  });
});
