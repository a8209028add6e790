import type { LogOptions } from './types';
import type { HandleLogFunction } from './internal-types';
import { prepareErrorObjectLog } from './utils/error-object';

/**
 * LoggerService for scoped logging with a service name and, optionally,
 * an entity name (e.g. the pod type a pool is currently working on)
 */
export class LoggerService {
  private readonly handleLog: HandleLogFunction;
  private readonly serviceName: string;
  private readonly entityName?: string;

  constructor(
    handleLog: HandleLogFunction,
    serviceName: string,
    entityName?: string,
  ) {
    this.handleLog = handleLog;
    this.serviceName = serviceName;
    this.entityName = entityName;
  }

  /**
   * Create a logger scoped to an entity within this service
   */
  public entity(entityName: string): LoggerService {
    return new LoggerService(this.handleLog, this.serviceName, entityName);
  }

  public error(message: string, options?: LogOptions): void {
    this.log('error', message, options);
  }

  /**
   * Log an error object with optional prefix
   */
  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    const message = prepareErrorObjectLog(prefix, error);

    this.handleLog('error', message, {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
      error,
    });
  }

  public info(message: string, options?: LogOptions): void {
    this.log('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.log('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.log('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.log('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.log('debug', message, options);
  }

  private log(
    type: 'error' | 'info' | 'warn' | 'success' | 'notice' | 'debug',
    message: string,
    options?: LogOptions,
  ): void {
    this.handleLog(type, message, {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
    });
  }
}
