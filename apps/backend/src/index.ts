// apps/backend/src/index.ts
import 'dotenv/config'

import { createApp } from './app.js'
import { loadConfig } from './lib/config.js'
import { resolveModel } from './lib/models.js'
import { createChat } from './lib/openai.js'
import { SessionRegistry } from './lib/session.js'

const config = loadConfig()

const app = createApp({
  registry: new SessionRegistry({ radius: config.radius }),
  chat: createChat(config),
  settings: {
    model: resolveModel(config.model),
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  },
  uploadLimit: config.uploadLimit,
  corsOrigins: config.corsOrigins,
})

app.listen(config.port, () => {
  console.log(`Backend running on http://localhost:${config.port}/api/health`)
})

export default app
