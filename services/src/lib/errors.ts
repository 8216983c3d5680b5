/** A referenced record (project, task, change order) no longer exists. */
export class NotFoundError extends Error {
  constructor(
    public readonly entity: string,
    public readonly id: number
  ) {
    super(`${entity} ${id} not found`);
    this.name = "NotFoundError";
  }
}
