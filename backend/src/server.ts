import dotenv from 'dotenv';
import http from 'http';
import { createApp } from './app';
import { loadConfig } from './config/app.config';

dotenv.config();

const config = loadConfig();
const app = createApp({ config });
const server = http.createServer(app);

// Start server
server.listen(config.port, () => {
  console.log(`\n🚀 Server is running on http://localhost:${config.port}`);
  console.log(`📝 Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`🤖 Generation: ${config.generation.configured ? config.generation.model : 'not configured'}\n`);
});
