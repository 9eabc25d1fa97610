import { describe, expect, test, afterEach } from 'vitest'
import fs from 'fs/promises'
import path from 'path'
import { PassThrough } from 'stream'
import { ConfigStore, createStdinPrompter } from '../../../src/config'
import { mkTempDir } from '../../test-util'

function collect(stream: PassThrough): () => string {
  const chunks: string[] = []
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf-8')))
  return () => chunks.join('')
}

describe('createStdinPrompter', () => {
  test('writes the question and resolves with the typed line', async () => {
    const input = new PassThrough()
    const output = new PassThrough()
    const written = collect(output)
    const prompter = createStdinPrompter(input, output)

    const answer = prompter.ask('Enter client id:')
    input.write('abc\n')

    expect(await answer).toBe('abc')
    expect(written()).toContain('Enter client id: ')
  })

  test('resolves with an empty answer when input closes', async () => {
    const input = new PassThrough()
    const output = new PassThrough()
    const prompter = createStdinPrompter(input, output)

    const answer = prompter.ask('Enter client id:')
    input.end()

    expect(await answer).toBe('')
  })

  test('answers questions in order from a single chunk of input', async () => {
    const input = new PassThrough()
    const output = new PassThrough()
    const prompter = createStdinPrompter(input, output)

    const first = prompter.ask('Enter client id:')
    input.write('abc\nsecret\njdoe\n')

    expect(await first).toBe('abc')
    expect(await prompter.ask('Enter client secret:')).toBe('secret')
    expect(await prompter.ask('Enter intra login:')).toBe('jdoe')
    prompter.close()
  })

  test('resolves with an empty answer once queued lines run out after input ends', async () => {
    const input = new PassThrough()
    const output = new PassThrough()
    const prompter = createStdinPrompter(input, output)
    input.end('abc\n')

    expect(await prompter.ask('Enter client id:')).toBe('abc')
    expect(await prompter.ask('Enter client secret:')).toBe('')
  })

  test('resolves with an empty answer after close', async () => {
    const input = new PassThrough()
    const output = new PassThrough()
    const prompter = createStdinPrompter(input, output)

    prompter.close()

    expect(await prompter.ask('Enter client id:')).toBe('')
  })

  test('say writes a line', async () => {
    const input = new PassThrough()
    const output = new PassThrough()
    const written = collect(output)

    createStdinPrompter(input, output).say('Create new Application')
    await new Promise((resolve) => setImmediate(resolve))

    expect(written()).toBe('Create new Application\n')
  })
})

describe('piped first-run setup', () => {
  let tempDir: string

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  test('writes the config when all answers arrive before the first question', async () => {
    tempDir = await mkTempDir('prompts-')
    const configPath = path.join(tempDir, 'intra-cli', 'config.toml')
    const store = new ConfigStore(configPath)
    const input = new PassThrough()
    const output = new PassThrough()
    input.end('abc\nsecret\njdoe\n')

    await store.createInteractive(createStdinPrompter(input, output))

    expect(await store.load()).toEqual({ client_id: 'abc', client_secret: 'secret', login: 'jdoe' })
  })
})
