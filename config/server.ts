import type { StrapiConfigContext } from '../src/types/strapi';

export default ({ env }: StrapiConfigContext) => ({
  host: env('HOST', '0.0.0.0'),
  port: env.int('PORT', 1337),
  app: {
    keys: env.array('APP_KEYS'),
  },
});
