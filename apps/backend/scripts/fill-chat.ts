#!/usr/bin/env tsx
import 'dotenv/config'
import readline from 'node:readline/promises'
import { readFile, writeFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { stdin as input, stdout as output } from 'node:process'
import { loadConfig } from '../src/lib/config.js'
import { errorMessage } from '../src/lib/errors.js'
import { analyzePlaceholders } from '../src/lib/insights.js'
import { isDoneCommand, runTurn } from '../src/lib/mediator.js'
import { resolveModel } from '../src/lib/models.js'
import { createChat } from '../src/lib/openai.js'
import { createSession, generateDocument, type FillSession } from '../src/lib/session.js'

function printValues(session: FillSession) {
  const filled = session.values.filledCount
  console.log(`Filled ${filled}/${session.values.size} placeholders.`)
  for (const [token, value] of Object.entries(session.values.mapping())) {
    console.log(`  ${token} = ${value || '(empty)'}`)
  }
}

async function writeOutput(session: FillSession, target: string) {
  const { buffer, preview } = generateDocument(session)
  await writeFile(target, buffer)
  console.log(`All placeholders replaced; document written to ${target}`)
  console.log('Preview (first few paragraphs):')
  console.log(preview.join('\n\n'))
}

async function main() {
  const [sourcePath, outPath = 'filled_document.docx'] = process.argv.slice(2)
  if (!sourcePath) {
    console.error('Usage: npm run chat -- <input.docx> [output.docx]')
    process.exit(1)
  }

  // fails before the document is read when no key is configured
  const config = loadConfig()
  const chat = createChat(config)
  const settings = {
    model: resolveModel(config.model),
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  }

  const session = createSession(await readFile(sourcePath), {
    fileName: basename(sourcePath),
    radius: config.radius,
  })

  console.log(`Detected ${session.placeholders.length} placeholders:`)
  for (const token of session.placeholders) {
    console.log(`- ${token}: ${session.contexts.get(token) ?? '(No context found)'}`)
  }
  console.log('Commands: :values, :insights, :generate (or type "done"), :exit')

  const rl = readline.createInterface({ input, output })

  while (true) {
    const line = await rl.question('> ')
    const trimmed = line.trim()
    if (!trimmed) continue
    if (trimmed === ':exit') break
    if (trimmed === ':values') {
      printValues(session)
      continue
    }
    if (trimmed === ':insights') {
      const insights = await analyzePlaceholders(session, chat, settings.model)
      for (const [token, insight] of insights) {
        console.log(`- ${token}: ${insight.description}${insight.example ? ` (e.g. ${insight.example})` : ''}`)
      }
      continue
    }
    if (trimmed === ':generate') {
      await writeOutput(session, outPath)
      continue
    }

    try {
      const turn = await runTurn(session, trimmed, chat, settings)
      console.log(turn.reply)
    } catch (err) {
      console.error('Chat error:', errorMessage(err))
      continue
    }
    if (isDoneCommand(trimmed)) await writeOutput(session, outPath)
  }

  rl.close()
}

main().catch((err) => {
  console.error(errorMessage(err))
  process.exit(1)
})
