import { config } from "../shared/config.js";
import { createApp } from "./app.js";

const start = () => {
  const app = createApp();
  app.listen(config.port, () => {
    console.log(`Dashboard preview on http://localhost:${config.port} (serving ${config.outputPath})`);
  });
};

start();
