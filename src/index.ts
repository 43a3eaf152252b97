import { createApp } from './app.js';

const PORT = Number(process.env.PORT ?? 3000);

const app = createApp();

// Start server
app.listen(PORT, () => {
  console.log(`Server running on http://localhost:${PORT}`);
});
