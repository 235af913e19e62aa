import { createApp } from "./app";
import { loadEnv } from "./config/env";

function bootstrap(): void {
  const env = loadEnv();
  const { app, logger } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info("Matching configuration", {
      chatModel: env.openaiChatModel,
      embeddingModel: env.openaiEmbeddingModel,
      topK: env.matchTopK,
      rescoreEnabled: env.matchRescoreEnabled,
      rescoreConcurrency: env.matchRescoreConcurrency,
    });
  });
}

bootstrap();
