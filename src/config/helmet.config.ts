import type { HelmetOptions } from 'helmet';

type CspDirectives = NonNullable<
  Exclude<HelmetOptions['contentSecurityPolicy'], boolean | undefined>['directives']
>;

const SELF = "'self'";
const NONE = "'none'";

/** JSON-only responses: nothing but same-origin fetches. */
const API_CSP: CspDirectives = {
  defaultSrc: [SELF],
  scriptSrc: [SELF],
  styleSrc: [SELF],
  imgSrc: [SELF, 'data:'],
  fontSrc: [SELF],
  connectSrc: [SELF],
  objectSrc: [NONE],
  frameSrc: [NONE],
  frameAncestors: [NONE],
  formAction: [SELF],
  baseUri: [SELF],
  upgradeInsecureRequests: [],
};

/** Swagger UI inlines its bootstrap script and styles. */
const DOCS_CSP: CspDirectives = {
  ...API_CSP,
  scriptSrc: [SELF, "'unsafe-inline'"],
  styleSrc: [SELF, "'unsafe-inline'"],
  imgSrc: [SELF, 'data:', 'https:'],
  fontSrc: [SELF, 'data:'],
};

const ONE_YEAR_SECONDS = 365 * 24 * 60 * 60;

/**
 * Security headers for every response. Pass `swaggerEnabled` when /api/docs
 * is mounted, otherwise the UI is blocked by the CSP.
 */
export function getHelmetConfig(swaggerEnabled: boolean): HelmetOptions {
  return {
    contentSecurityPolicy: { directives: swaggerEnabled ? DOCS_CSP : API_CSP },
    crossOriginEmbedderPolicy: true,
    crossOriginOpenerPolicy: { policy: 'same-origin' },
    // address pickers on whitelisted origins read the responses
    crossOriginResourcePolicy: { policy: 'cross-origin' },
    dnsPrefetchControl: { allow: false },
    frameguard: { action: 'deny' },
    hsts: { maxAge: ONE_YEAR_SECONDS, includeSubDomains: true },
    noSniff: true,
    originAgentCluster: true,
    permittedCrossDomainPolicies: { permittedPolicies: 'none' },
    referrerPolicy: { policy: 'no-referrer' },
  };
}

export function getHelmetSecuritySummary(swaggerEnabled: boolean): Record<string, string> {
  return {
    csp: swaggerEnabled ? 'relaxed for Swagger UI' : `default-src ${SELF}`,
    hsts: `max-age=${ONE_YEAR_SECONDS}; includeSubDomains`,
    frameOptions: 'DENY',
    referrerPolicy: 'no-referrer',
  };
}
