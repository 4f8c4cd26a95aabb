import { createApp } from "./app.js";

const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

const app = createApp();

app.listen(PORT, () => {
  console.log(`[server] Flowlab API running at http://localhost:${PORT}`);
});
