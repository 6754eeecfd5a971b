import path from 'path';
import winston from 'winston';
import Transport from 'winston-transport';
import { SupabaseClient } from '@supabase/supabase-js';
import { getSupabaseClient } from '../db/supabase';

/**
 * Mirrors warn/error lines and decision lines to the `engine_logs` table.
 */
class SupabaseCriticalTransport extends Transport {
  private client: SupabaseClient;

  constructor(opts: Transport.TransportStreamOptions & { supabaseClient: SupabaseClient }) {
    super(opts);
    this.client = opts.supabaseClient;
  }

  log(info: { level: string; message: string }, callback: () => void) {
    setImmediate(() => {
      this.emit('logged', info);
    });

    const level = info.level;
    const message = String(info.message);

    const isCritical =
      level === 'error' ||
      level === 'warn' ||
      message.includes('[DECISION]') ||
      message.includes('[REJECT]') ||
      message.includes('[TIMEOUT]');

    if (isCritical) {
      Promise.resolve(
        this.client.from('engine_logs').insert({
          action: level,
          details: { message },
          timestamp: new Date().toISOString()
        })
      ).catch((err: unknown) => {
        const reason = err instanceof Error ? err.message : String(err);
        process.stderr.write(`[LOGGING] engine_logs insert failed: ${reason}\n`);
      });
    }

    callback();
  }
}

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

const logDir = process.env.LOG_DIR;
if (logDir) {
  transports.push(
    new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' }),
    new winston.transports.File({ filename: path.join(logDir, 'combined.log') }),
  );
}

const supabase = getSupabaseClient();
if (supabase) {
  transports.push(new SupabaseCriticalTransport({ supabaseClient: supabase }));
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
