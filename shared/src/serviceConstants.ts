// Central service naming constants used to tag telemetry with its emitting process.

export const SERVICE_PLAY_CLI = 'play-cli'
export const SERVICE_AUTHOR_CLI = 'author-cli'
export const SERVICE_ENGINE = 'story-engine'

export function serviceLabel(name: string): string {
    switch (name) {
        case SERVICE_PLAY_CLI:
            return 'Terminal Play Loop'
        case SERVICE_AUTHOR_CLI:
            return 'World Authoring'
        case SERVICE_ENGINE:
            return 'Story Engine'
        default:
            return name
    }
}
