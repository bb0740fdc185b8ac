import asyncHandler from './asyncHandler';
import globalErrorHandler from './globalErrorHandler';
import notFoundHandler from './notFound';

export { asyncHandler, globalErrorHandler, notFoundHandler };
