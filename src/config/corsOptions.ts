import { CorsOptions } from 'cors';

const createCorsOptions = (allowedOrigins: string[]): CorsOptions => ({
  origin: (origin, callback) => {
    // Same-origin and non-browser requests carry no Origin header
    if (!origin || allowedOrigins.includes(origin)) {
      return callback(null, true);
    }

    callback(new Error('Not allowed by CORS'));
  },
  methods: ['POST', 'GET'],
});

export default createCorsOptions;
