import mongoose, { Connection } from 'mongoose';
import { safeLogger } from './security/safeLogger';

export async function connectDatabase(uri: string): Promise<Connection> {
  const connection = mongoose.createConnection(uri);
  connection.on('disconnected', () => safeLogger.warn('db.disconnected'));
  connection.on('error', (err: Error) => safeLogger.error('db.error', { message: err.message }));

  await connection.asPromise();
  safeLogger.info('db.connected', { name: connection.name });
  return connection;
}
