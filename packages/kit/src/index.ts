export { parseEnv } from "./parse-env.js";
export { isMainModule } from "./is-main.js";
export { backoffDelay } from "./backoff-delay.js";
export { positiveOrThrow } from "./positive-or-throw.js";
export { isSanePrice } from "./is-sane-price.js";
export { formatZodErrors } from "./zod-helpers.js";
