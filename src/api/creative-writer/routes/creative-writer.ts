/**
 * Creative Writer API Routes
 *
 * These are available at /api/creative-writer/*
 */
export default {
  routes: [
    {
      method: 'POST',
      path: '/creative-writer/article',
      handler: 'creative-writer.article',
      config: {
        auth: false,
        policies: [],
      },
    },
    {
      method: 'GET',
      path: '/creative-writer/evaluations/:runId',
      handler: 'creative-writer.evaluations',
      config: {
        auth: false,
        policies: [],
      },
    },
    {
      method: 'GET',
      path: '/creative-writer/status',
      handler: 'creative-writer.status',
      config: {
        auth: false,
        policies: [],
      },
    },
  ],
};
