export { ByteCursor } from './ByteCursor';
