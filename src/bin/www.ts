#!/usr/bin/env node

/**
 * Module dependencies.
 */

import debug from 'debug';
import http from 'http';
import { loadConfig } from '../config';
import { createDb, createPool } from '../db/index';
import { createAuth } from '../auth';
import { createServices } from '../services/index';
import { createApp } from '../app';

const debugLog = debug('inkwell:server');

/**
 * Load configuration and wire the app.
 */

const config = loadConfig();
const pool = createPool(config.databaseUrl);
const db = createDb(pool);
const auth = createAuth(db, config);
const app = createApp({ auth, services: createServices(db), config });

/**
 * Get port from environment and store in Express.
 */

const port = normalizePort(config.port);
app.set('port', port);

/**
 * Create HTTP server.
 */

const server = http.createServer(app);

/**
 * Listen on provided port, on all network interfaces.
 */

server.listen(port);
server.on('error', onError);
server.on('listening', onListening);

console.log(`🚀 Server starting on port ${port}`);
console.log(`📍 Environment: ${config.env}`);
console.log(`🔗 Server will be available at: ${config.baseUrl}`);

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

/**
 * Normalize a port into a number, string, or false.
 */

function normalizePort(val: string): number | string | false {
  const portNum = parseInt(val, 10);

  if (isNaN(portNum)) {
    // named pipe
    return val;
  }

  if (portNum >= 0) {
    // port number
    return portNum;
  }

  return false;
}

/**
 * Event listener for HTTP server "error" event.
 */

function onError(error: NodeJS.ErrnoException): void {
  if (error.syscall !== 'listen') {
    throw error;
  }

  const bind = typeof port === 'string'
    ? 'Pipe ' + port
    : 'Port ' + port;

  // handle specific listen errors with friendly messages
  switch (error.code) {
    case 'EACCES':
      console.error(bind + ' requires elevated privileges');
      process.exit(1);
      break;
    case 'EADDRINUSE':
      console.error(bind + ' is already in use');
      process.exit(1);
      break;
    default:
      throw error;
  }
}

/**
 * Event listener for HTTP server "listening" event.
 */

function onListening(): void {
  const addr = server.address();
  const bind = typeof addr === 'string'
    ? 'pipe ' + addr
    : 'port ' + addr?.port;
  debugLog('Listening on ' + bind);
  console.log(`✅ Server is running and listening on ${bind}`);
}

/**
 * Stop accepting connections, then release the pool.
 */

function shutdown(signal: NodeJS.Signals): void {
  console.log(`🛑 ${signal} received, shutting down`);
  server.close((closeError) => {
    if (closeError) {
      console.error('Error closing server:', closeError);
    }
    pool.end().then(
      () => process.exit(closeError ? 1 : 0),
      (poolError: unknown) => {
        console.error('Error closing database pool:', poolError);
        process.exit(1);
      },
    );
  });
}
