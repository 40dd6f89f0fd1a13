export interface PrintCommandOptions {
  image?: string;
  address?: string;
  test: boolean;
  copies: number;
  window: number;
  skipStatus: boolean;
  completionTimeout: number;
  capture?: string;
}
