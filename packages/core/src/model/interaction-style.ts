export enum InteractionStyle {
  Synchronous = 'Synchronous',
  Asynchronous = 'Asynchronous',
}
