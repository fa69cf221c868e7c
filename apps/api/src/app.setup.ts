import { INestApplication, ValidationPipe } from '@nestjs/common';
import session from 'express-session';
import { AppConfig } from './config/app.config';

/** Middleware and pipes shared by the server entry point and the e2e tests. */
export function configureApp(app: INestApplication, config: AppConfig): void {
  app.use(
    session({
      secret: config.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: {
        httpOnly: true,
        sameSite: 'lax',
        secure: config.production,
        maxAge: config.sessionMaxAgeMs,
      },
    }),
  );
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
}
