declare module 'signalfx' {
  export type SignalFlowOptions = {
    signalflowEndpoint?: string;
    apiEndpoint?: string;
    webSocketErrorCallback?: (error: unknown) => void;
  };

  export type SignalFlowExecuteRequest = {
    program: string;
    start?: number;
    stop?: number;
    resolution?: number;
    maxDelay?: number;
    immediate?: boolean;
  };

  export type SignalFlowMessage = {
    type?: string;
    channel?: string;
    [key: string]: unknown;
  };

  export interface SignalFlowHandle {
    stream(callback: (error: unknown, message?: SignalFlowMessage) => void): void;
    close(): void;
  }

  export interface SignalFlowClient {
    execute(request: SignalFlowExecuteRequest): SignalFlowHandle;
    disconnect(): void;
  }

  const signalfx: {
    SignalFlow: new (token: string, options?: SignalFlowOptions) => SignalFlowClient;
  };

  export default signalfx;
}
