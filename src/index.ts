/**
 * Server entry point
 * Loads configuration and starts HTTP server
 */

import { getConfig } from './config.js';
import { loadHostConfiguration } from './host-config.js';
import { createApp } from './server.js';

// Load and validate configuration (fails fast if invalid)
const config = getConfig();
const host = loadHostConfiguration(config.hostConfigPath);

// Create Express app
const app = createApp(config, host);

// Start server
app.listen(config.port, () => {
  console.log(`Server listening on port ${config.port}`);
  console.log(`Host configuration: ${config.hostConfigPath}`);
  console.log(`Max rules per request: ${config.maxRules}`);
  console.log(`Body limit: ${config.bodyLimit}`);
});
