/* eslint-disable @typescript-eslint/no-unused-vars */
import { ErrorRequestHandler } from 'express';
import httpStatus from 'http-status';
import { ZodError } from 'zod';
import { handleZodError } from '../errors';
import { IErrorSource } from '../types';
import { ILogger, Logger } from './logger';

interface IErrorHandlerOptions {
  exposeStack: boolean;
  logger?: ILogger;
}

const globalErrorHandler = ({
  exposeStack,
  logger = Logger,
}: IErrorHandlerOptions): ErrorRequestHandler => {
  return (err: unknown, req, res, _next) => {
    let statusCode: number = httpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Something went wrong!';
    let errors: IErrorSource[] = [
      {
        path: '',
        message: 'Something went wrong',
      },
    ];

    if (err instanceof ZodError) {
      const modifier = handleZodError(err);
      statusCode = modifier.statusCode;
      message = modifier.message;
      errors = modifier.errors;
    } else if (err instanceof Error) {
      // body-parser and friends attach the intended status to the error
      const status: unknown = Reflect.get(err, 'status');
      if (typeof status === 'number') {
        statusCode = status;
      }
      message = err.message;
      errors = [{ path: '', message: err.message }];
    }

    if (statusCode >= httpStatus.INTERNAL_SERVER_ERROR) {
      logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
    }

    const stack = err instanceof Error ? err.stack : undefined;

    res.status(statusCode).json({
      success: false,
      statusCode,
      message,
      errorMessages: errors,
      ...(exposeStack && stack ? { stack } : {}),
    });
  };
};

export default globalErrorHandler;
