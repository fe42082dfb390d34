export class TeamLookupError extends Error {
  constructor(
    message: string,
    public readonly context: { missing?: string[] } = {}
  ) {
    super(message);
    this.name = 'TeamLookupError';
  }
}

export class MatchLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MatchLookupError';
  }
}

export class PlayerLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlayerLookupError';
  }
}

export class InvalidParticipantsError extends Error {
  constructor(
    message: string,
    public readonly code: 'same_team'
  ) {
    super(message);
    this.name = 'InvalidParticipantsError';
  }
}
