import { BadRequestException, INestApplication, ValidationPipe } from '@nestjs/common';
import { json } from 'express';
import type { Request, Response } from 'express';
import helmet from 'helmet';
import type { AppEnv } from './common/config/env.validation';
import { INVALID_PAYLOAD_MESSAGE } from './common/constants/error-messages.constants';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { createRequestContextMiddleware } from './common/middleware/request-context.middleware';

/**
 * HTTP pipeline shared by the server and the e2e suite. The app must be
 * created with `bodyParser: false` so the raw body reaches the webhook
 * signature guard.
 */
export function configureApp(
  app: INestApplication,
  env: Pick<AppEnv, 'REQUEST_DEADLINE_MS'>,
): void {
  app.use(helmet());

  app.use(
    json({
      limit: '1mb',
      verify: (req: Request, _res: Response, buf: Buffer) => {
        req.rawBody = buf.toString('utf8');
      },
    }),
  );

  app.use(createRequestContextMiddleware({ deadlineMs: env.REQUEST_DEADLINE_MS }));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: () => new BadRequestException(INVALID_PAYLOAD_MESSAGE),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
}
