import { GAME_CONFIG, GAME_VERSION } from "./config/game-config";
import { loadRuntimeConfig } from "./config/runtime-config";
import { GameApp } from "./core/game-app";
import { GameLoop } from "./core/game-loop";
import { getCurrentLanguage, initI18n } from "./i18n";
import { InputManager } from "./input/input-manager";
import { TerminalRenderer } from "./render/terminal-renderer";
import { createFileHighscoreStore } from "./storage/highscores";
import { createLogger } from "./util/logger";

async function bootstrap(): Promise<void> {
  const config = loadRuntimeConfig();
  const logger = createLogger(config);
  await initI18n(config.language);

  const app = new GameApp({
    highscores: createFileHighscoreStore(config.highscoreFile, logger),
    logger
  });
  const renderer = new TerminalRenderer(process.stdout, { color: config.color });
  const input = new InputManager(process.stdin);

  let stopped = false;
  const shutdown = (exitCode: number): void => {
    if (stopped) {
      return;
    }
    stopped = true;
    loop.stop();
    input.dispose();
    renderer.dispose();
    logger.info({ exitCode }, "shutting down");
    logger.flush();
    process.exitCode = exitCode;
  };

  const loop = new GameLoop(
    {
      update: () => {
        for (const action of input.drain()) {
          app.handle(action);
          if (app.quitRequested) {
            shutdown(0);
            return;
          }
        }
        app.update();
      },
      render: () => renderer.render(app.getFrame()),
      onError: (error) => {
        logger.fatal({ err: error }, "game loop crashed");
        shutdown(1);
        console.error(error);
      }
    },
    1000 / GAME_CONFIG.fps
  );

  process.once("SIGTERM", () => shutdown(0));

  logger.info({ version: GAME_VERSION, language: getCurrentLanguage(), dataDir: config.dataDir }, "starting");
  renderer.start();
  input.start();
  loop.start();
}

bootstrap().catch((error: unknown) => {
  console.error("failed to start", error);
  process.exitCode = 1;
});
