/**
 * A store that can snapshot itself. `checkpoint()` returns a function that
 * puts the store back to the state it had when the checkpoint was taken.
 */
export interface Checkpointable {
  checkpoint(): () => void;
}
