export class CapacityExceededError extends Error {
  constructor(
    public readonly resource: "rooms" | "players",
    public readonly limit: number,
  ) {
    super(
      resource === "rooms"
        ? `Maximum room limit (${limit}) reached`
        : "Room is full",
    );
    this.name = "CapacityExceededError";
  }
}
