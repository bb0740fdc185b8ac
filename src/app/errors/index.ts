import handleZodError from './handleZodError';
import { ConfigurationError } from './CustomErrors';

export { handleZodError, ConfigurationError };
