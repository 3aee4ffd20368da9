/**
 * Domain exceptions.
 */

export {
    StoryException,
    WorldConfigurationException,
    VariableParseException,
    GenerationFailedException,
    type WorldConfigurationErrorCode,
    type GenerationFailureReason
} from './storyExceptions.js'
