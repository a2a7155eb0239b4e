export class EmptyQueueError extends Error {
  constructor(message = 'Cannot dequeue from an empty queue') {
    super(message);
    this.name = 'EmptyQueueError';
  }
}
