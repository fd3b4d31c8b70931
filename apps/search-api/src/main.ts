import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { Logger } from "@nestjs/common";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";

async function bootstrap() {
  const { env } = await import("@repo/env");
  const app = await NestFactory.create(AppModule, {
    logger:
      env.NODE_ENV === "production"
        ? ["log", "warn", "error"]
        : ["log", "warn", "error", "debug"],
  });

  app.enableShutdownHooks();
  app.enableCors({
    origin: "*", // For development. Lock down in production.
    methods: "GET,HEAD,POST,OPTIONS",
  });
  configureApp(app);

  await app.listen(env.PORT);
  Logger.log(
    `Scene search API listening on http://localhost:${env.PORT}`,
    "Bootstrap",
  );
}

void bootstrap();
