export { errorHandler } from './errorHandler';
