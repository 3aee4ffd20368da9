/**
 * Terminal play loop.
 *
 * Usage: npm run play -- [world.json]
 * The world file defaults to WAYMARK_WORLD_PATH, then game_data.json.
 * Ctrl+C cancels a pending generation; at the prompt it quits.
 */
import 'reflect-metadata'
import { SERVICE_PLAY_CLI } from '@waymark/shared'
import { Container } from 'inversify'
import { stdin as input, stdout as output } from 'node:process'
import { createInterface } from 'node:readline/promises'
import { setupContainer } from '../inversify.config.js'
import type { ActionOutcome, ImageOutcome, MoveOutcome, StartOutcome, WorldSession } from '../services/WorldSession.js'
import { WorldSessionFactory } from '../services/WorldSessionFactory.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { loadWorldFile } from '../world/worldLoader.js'
import { HELP_TEXT, parseCommand } from './commands.js'
import { renderAsciiMap, renderFailure, renderTurn } from './render.js'

type Outcome = StartOutcome | MoveOutcome | ActionOutcome | ImageOutcome
type Step = (signal: AbortSignal) => Promise<Outcome>

function print(text: string): void {
    output.write(`${text}\n`)
}

function report(session: WorldSession, outcome: Outcome): boolean {
    switch (outcome.status) {
        case 'ready':
        case 'moved':
        case 'applied':
            print(renderTurn(session))
            return true
        case 'loaded':
            print(`Image saved to ${outcome.path}`)
            return true
        case 'blocked':
            print(`You can't go ${outcome.direction} from here.`)
            return true
        case 'unavailable':
            print('Room images are disabled (set WAYMARK_IMAGE_GENERATION=true).')
            return true
        case 'busy':
            print('Still working on the last request.')
            return true
        case 'generation-failed':
            print(renderFailure(outcome.failure))
            return false
    }
}

async function main(): Promise<void> {
    process.env.WAYMARK_SERVICE_NAME ??= SERVICE_PLAY_CLI
    const worldPath = process.argv[2] ?? process.env.WAYMARK_WORLD_PATH ?? 'game_data.json'
    const world = await loadWorldFile(worldPath)
    const container = await setupContainer(new Container())
    const session = container.get(WorldSessionFactory).create(world)
    const telemetry = container.get(TelemetryService)

    const rl = createInterface({ input, output })
    let inflight: AbortController | null = null
    let closed = false
    rl.on('SIGINT', () => {
        if (inflight) {
            inflight.abort()
        } else {
            rl.close()
        }
    })
    rl.on('close', () => {
        closed = true
    })

    let pendingRetry: Step | null = null
    const run = async (step: Step): Promise<void> => {
        inflight = new AbortController()
        try {
            const ok = report(session, await step(inflight.signal))
            pendingRetry = ok ? null : step
        } finally {
            inflight = null
        }
    }

    print(renderTurn(session))
    print('')
    await run((signal) => session.start({ signal }))

    try {
        while (!closed) {
            let line: string
            try {
                line = await rl.question('\n> ')
            } catch (error) {
                // Interface closed while waiting (Ctrl+C or end of input)
                if (closed) break
                throw error
            }

            const command = parseCommand(line)
            switch (command.kind) {
                case 'quit':
                    rl.close()
                    break
                case 'help':
                    print(HELP_TEXT)
                    break
                case 'unknown':
                    print(command.message)
                    break
                case 'map':
                    print(renderAsciiMap(session.layout(), session.rooms))
                    break
                case 'move':
                    await run((signal) => session.move(command.direction, { signal }))
                    break
                case 'action': {
                    const action = session.actions[command.index]
                    if (!action) {
                        print(`There is no action ${command.index + 1}.`)
                        break
                    }
                    await run((signal) => session.takeAction(action, { signal }))
                    break
                }
                case 'image':
                    await run((signal) => session.loadRoomImage({ signal }))
                    break
                case 'retry':
                    if (pendingRetry) {
                        await run(pendingRetry)
                    } else {
                        print('Nothing to retry.')
                    }
                    break
            }
        }
    } finally {
        rl.close()
        await telemetry.flush()
    }
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error)
    process.exitCode = 1
})
