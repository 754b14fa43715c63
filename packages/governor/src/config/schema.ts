import { z } from 'zod';
import { EMERGENCY_RESPONSES } from './types.js';

// Durations in the document are seconds; fractions are allowed.
const seconds = z.number().finite().nonnegative();
const count = z.number().int().nonnegative();

const randomLongDelaysSchema = z
  .object({
    enabled: z.boolean().optional(),
    probability: z.number().finite().optional(),
    min_delay: seconds.optional(),
    max_delay: seconds.optional(),
  })
  .strict();

const circuitBreakerSchema = z
  .object({
    enabled: z.boolean().optional(),
    failure_threshold: count.optional(),
    recovery_timeout: seconds.optional(),
  })
  .strict();

const sessionManagementSchema = z.object({
  max_requests_per_session: count.optional(),
  max_session_duration: seconds.optional(),
  session_renewal_jitter: seconds.optional(),
  cookie_persistence: z.boolean().optional(),
  session_fingerprint_rotation: z.boolean().optional(),
});

const requestPatternsSchema = z.object({
  base_delay: seconds.optional(),
  max_delay: seconds.optional(),
  delay_jitter: seconds.optional(),
  min_delay: seconds.optional(),
  burst_protection: z.boolean().optional(),
  max_requests_per_minute: count.optional(),
  max_requests_per_hour: count.optional(),
  human_like_patterns: z.boolean().optional(),
  random_long_delays: randomLongDelaysSchema.optional(),
});

const failureHandlingSchema = z.object({
  max_failed_requests: count.optional(),
  success_rate_threshold: z.number().finite().optional(),
  retry_attempts: count.optional(),
  exponential_backoff: z.boolean().optional(),
  circuit_breaker: circuitBreakerSchema.optional(),
});

const securityFeaturesSchema = z.object({
  enable_proxy_rotation: z.boolean().optional(),
  enable_profile_rotation: z.boolean().optional(),
  enable_captcha_solving: z.boolean().optional(),
  enable_cloudflare_bypass: z.boolean().optional(),
  enable_javascript_rendering: z.boolean().optional(),
  stealth_mode: z.boolean().optional(),
  aggressive_mode: z.boolean().optional(),
});

const detectionEvasionSchema = z.object({
  randomize_headers: z.boolean().optional(),
  randomize_tls_fingerprint: z.boolean().optional(),
  simulate_human_behavior: z.boolean().optional(),
  header_order_randomization: z.boolean().optional(),
  tcp_fingerprint_randomization: z.boolean().optional(),
});

/**
 * A site override is flat: any leaf of the global groups, plus the capability flags.
 */
const siteOverrideSchema = sessionManagementSchema
  .merge(requestPatternsSchema)
  .merge(failureHandlingSchema)
  .merge(securityFeaturesSchema)
  .merge(detectionEvasionSchema)
  .extend({
    requires_javascript: z.boolean().optional(),
    requires_login: z.boolean().optional(),
  })
  .strict();

const emergencyResponseSchema = z.enum(EMERGENCY_RESPONSES);

const emergencyProtocolsSchema = z
  .object({
    ip_ban_detection: z
      .object({
        enabled: z.boolean().optional(),
        indicators: z.array(z.string().trim().min(1)).optional(),
        response: emergencyResponseSchema.optional(),
      })
      .strict()
      .optional(),
    captcha_flood: z
      .object({
        enabled: z.boolean().optional(),
        threshold: z.number().int().positive().optional(),
        response: emergencyResponseSchema.optional(),
        min_delay: seconds.optional(),
        max_delay: seconds.optional(),
      })
      .strict()
      .optional(),
    rate_limit_detection: z
      .object({
        enabled: z.boolean().optional(),
        respect_retry_after: z.boolean().optional(),
        default_backoff: seconds.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const governorConfigSchema = z
  .object({
    session_management: sessionManagementSchema.strict().optional(),
    request_patterns: requestPatternsSchema.strict().optional(),
    failure_handling: failureHandlingSchema.strict().optional(),
    security_features: securityFeaturesSchema.strict().optional(),
    detection_evasion: detectionEvasionSchema.strict().optional(),
    site_specific: z.record(z.string().min(1), siteOverrideSchema).optional(),
    emergency_protocols: emergencyProtocolsSchema.optional(),
  })
  .strict();

type SiteOverrideDocument = z.infer<typeof siteOverrideSchema>;
type EmergencyProtocolsDocument = z.infer<typeof emergencyProtocolsSchema>;
type GovernorConfigDocument = z.infer<typeof governorConfigSchema>;

export { governorConfigSchema, siteOverrideSchema, emergencyProtocolsSchema };
export type {
  SiteOverrideDocument,
  EmergencyProtocolsDocument,
  GovernorConfigDocument,
};
