import httpStatus from 'http-status';
import { ZodError } from 'zod';
import { IErrorSource } from '../types';

const handleZodError = (err: ZodError) => {
  const errors: IErrorSource[] = err.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }));

  return {
    statusCode: httpStatus.BAD_REQUEST,
    message: 'Validation Error',
    errors,
  };
};

export default handleZodError;
