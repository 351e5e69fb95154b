export interface AgentTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface IncomingChat {
  clientPhone: string;
  clientName?: string;
  message: string;
  timezone?: string;
}

export interface AgentResponse {
  success: boolean;
  clientPhone: string;
  response: string;
  toolsUsed: string[];
  fallback: boolean;
}
