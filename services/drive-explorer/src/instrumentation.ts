import { startInstrumentation } from '@drive-explorer/instrumentation';

startInstrumentation({ serviceName: 'drive-explorer' });
