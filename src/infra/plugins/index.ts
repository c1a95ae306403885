export { registerCors, CorsOriginError } from './cors.js';
