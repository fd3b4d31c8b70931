import { type INestApplication, ValidationPipe } from "@nestjs/common";

/**
 * Global pipes shared by the server and the e2e tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
      transformOptions: {
        enableImplicitConversion: true,
        exposeDefaultValues: true,
      },
      validationError: {
        target: false,
        value: true,
      },
    }),
  );
  return app;
}
