declare module 'http' {
  interface IncomingMessage {
    /** Unparsed body, kept for webhook signature checks */
    rawBody?: Buffer;
  }
}

export {};
