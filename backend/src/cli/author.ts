/**
 * World authoring command.
 *
 * Usage: npm run author -- <world.json> [completed.json]
 * Writes canon events for rooms that have none and, when the world lists no variables,
 * an initial set. The completed world replaces the input unless an output path is given.
 */
import 'reflect-metadata'
import { SERVICE_AUTHOR_CLI, type IWorldAuthor } from '@waymark/shared'
import { Container } from 'inversify'
import { stdout as output } from 'node:process'
import { TOKENS } from '../di/tokens.js'
import { setupContainer } from '../inversify.config.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { authorWorldFile } from '../world/worldAuthoring.js'
import { renderAuthoringSummary } from './render.js'

async function main(): Promise<void> {
    process.env.WAYMARK_SERVICE_NAME ??= SERVICE_AUTHOR_CLI
    const [inputPath, outputPath] = process.argv.slice(2)
    if (!inputPath) {
        throw new Error('Usage: npm run author -- <world.json> [completed.json]')
    }

    const container = await setupContainer(new Container())
    const telemetry = container.get(TelemetryService)
    const controller = new AbortController()
    process.once('SIGINT', () => controller.abort())

    try {
        const summary = await authorWorldFile(inputPath, container.get<IWorldAuthor>(TOKENS.WorldAuthor), telemetry, {
            outputPath,
            signal: controller.signal
        })
        output.write(`${renderAuthoringSummary(summary, outputPath ?? inputPath)}\n`)
    } finally {
        await telemetry.flush()
    }
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error)
    process.exitCode = 1
})
