export class ValidationError extends Error {
  field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class RemoteError extends Error {
  broker: string;
  url: string;
  status?: number;
  timedOut: boolean;

  constructor(
    message: string,
    context: { broker: string; url: string; status?: number; timedOut?: boolean; cause?: unknown },
  ) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = 'RemoteError';
    this.broker = context.broker;
    this.url = context.url;
    this.status = context.status;
    this.timedOut = context.timedOut ?? false;
  }
}

export class NormalizationError extends Error {
  broker: string;
  issues: string[];

  constructor(message: string, broker: string, issues: string[] = []) {
    super(message);
    this.name = 'NormalizationError';
    this.broker = broker;
    this.issues = issues;
  }
}

export class UnknownBrokerError extends Error {
  broker: string;
  known: string[];

  constructor(broker: string, known: string[]) {
    super(
      `Unknown broker "${broker}". Registered: ${known.length > 0 ? known.map((k) => `"${k}"`).join(', ') : '(none)'}.`,
    );
    this.name = 'UnknownBrokerError';
    this.broker = broker;
    this.known = known;
  }
}

export class ConfigurationError extends Error {
  code?: string;
  chain: string[];

  constructor(message: string, code?: string, chain: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.code = code;
    this.chain = chain;
  }
}
