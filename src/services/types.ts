/**
 * Shared type definitions for the services layer.
 */

/**
 * Function to unsubscribe from an event or callback.
 */
export type Unsubscribe = () => void;
