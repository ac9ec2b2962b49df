/**
 * SessionState
 * 現在のprincipalとのやり取りを追記のみで保持する（所有者はオーケストレーター）
 */

export interface Exchange {
  readonly request: string;
  readonly response: string;
}

export class SessionState {
  private readonly exchanges: Exchange[] = [];

  constructor(readonly principalId: number) {}

  append(request: string, response: string): void {
    this.exchanges.push({ request, response });
  }

  /** 読み取り用のスナップショット */
  history(): readonly Exchange[] {
    return [...this.exchanges];
  }

  get size(): number {
    return this.exchanges.length;
  }
}
