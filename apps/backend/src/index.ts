/**
 * Punto de entrada del API del generador.
 */
import { crearApp } from './app';
import { configuracion } from './configuracion';
import { logError, log } from './infraestructura/logging/logger';

function iniciar() {
  const app = crearApp();
  const servidor = app.listen(configuracion.puerto, () => {
    log('ok', 'API de loteria escuchando', { puerto: configuracion.puerto });
  });
  servidor.on('error', (error) => {
    logError('Error al iniciar el servidor', error);
    process.exit(1);
  });
}

iniciar();
