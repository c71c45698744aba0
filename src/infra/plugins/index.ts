export { registerCors, getAllowedOrigins, isLocalhostOrigin, CorsOriginError } from './cors.js';
export { registerSecurityHeaders, CSP_DIRECTIVES } from './security-headers.js';
