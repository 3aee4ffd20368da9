/**
 * Prompt builders for non-canon events and action sets, and for the authoring prompts that
 * complete a world file (canon events, initial variables).
 *
 * The source story is optional context; when absent its section is left out entirely.
 */
import type { Room, StoryEvent, VariableSnapshot } from '@waymark/shared'

export const EVENT_WORD_LIMIT = 100
export const ACTION_COUNT = 3

export const STORY_SYSTEM_PROMPT =
    'You narrate an interactive adventure set inside an existing story. Stay consistent with the story, the room and what the player has already seen.'

export interface NonCanonEventPromptInput {
    story: string
    room: Pick<Room, 'name' | 'description' | 'canonEvent'>
    seenEvents: readonly string[]
}

export interface CanonEventPromptInput {
    story: string
    room: Pick<Room, 'name' | 'description'>
}

export interface ActionsPromptInput {
    story: string
    room: Pick<Room, 'name' | 'description'>
    event: StoryEvent
    variables: VariableSnapshot
}

function section(title: string, body: string): string {
    return `${title}:\n${body}`
}

function storySection(story: string): string[] {
    const trimmed = story.trim()
    return trimmed ? [section('Story', trimmed)] : []
}

/** `name: value` lines, or a marker when nothing is tracked. */
export function formatVariableLines(variables: VariableSnapshot): string {
    const lines = Object.entries(variables).map(([name, value]) => `${name}: ${String(value)}`)
    return lines.length ? lines.join('\n') : '(no variables tracked)'
}

export function buildNonCanonEventPrompt({ story, room, seenEvents }: NonCanonEventPromptInput): string {
    const seen = seenEvents.length ? seenEvents.map((event) => `- ${event}`).join('\n') : '(none yet)'

    return [
        `The player has left the story's original route. Describe a plausible event that happens in this room instead of its original event, taking the events the player has already seen into account. Keep it to ${EVENT_WORD_LIMIT} words or fewer.`,
        ...storySection(story),
        section('Room', `${room.name}\n${room.description}`),
        section('Original event', room.canonEvent),
        section('Events seen so far', seen)
    ].join('\n\n')
}

export function buildActionsPrompt({ story, room, event, variables }: ActionsPromptInput): string {
    return [
        `List ${ACTION_COUNT} actions the player can take in this room given the story, the current event and the variables.`,
        [
            'Respond with a JSON object of the form',
            '{"actions": [{"action_description": "...", "changed_variables": ["variable_name: new_value"]}]}',
            'Each action has a short description and the variables it changes, one "variable_name: new_value" string per variable.',
            'Only change variables listed below.'
        ].join('\n'),
        ...storySection(story),
        section('Room', `${room.name}\n${room.description}`),
        section(event.isCanon ? 'Current event' : 'Current event (off the original route)', event.text),
        section('Current variables', formatVariableLines(variables))
    ].join('\n\n')
}

export function buildCanonEventPrompt({ story, room }: CanonEventPromptInput): string {
    return [
        `What event in the story happens in this room? Keep it to ${EVENT_WORD_LIMIT} words or fewer.`,
        ...storySection(story),
        section('Room', `${room.name}\n${room.description}`)
    ].join('\n\n')
}

export function buildVariablesPrompt({ story }: { story: string }): string {
    return [
        'What factors influence the story? Create a few variables that track important story values. Do not track the current location or the locations visited.',
        [
            'Respond with a JSON object of the form',
            '{"variables": ["variable_name: initial_value"]}',
            'Initial values are whole numbers, true or false, or short text.'
        ].join('\n'),
        ...storySection(story)
    ].join('\n\n')
}
