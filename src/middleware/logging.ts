import morgan from 'morgan';

import { getTelemetryClient } from '../telemetry/appInsights';

const stream = {
  write: (message: string) => {
    process.stdout.write(message);

    getTelemetryClient()?.trackTrace({ message: message.replace(/\n$/, '') });
  },
};

export const loggingMiddleware = morgan(
  '[RAB API] :method :url :status :res[content-length] - :response-time ms',
  {
    stream,
    skip: () => process.env.NODE_ENV === 'test',
  },
);
