/**
 * ドメイン型定義
 */

/** 権限レベル（ストアから読み込んだprincipalはすべて basic） */
export type Capability = 'unauthorized' | 'basic' | 'admin';

/**
 * セッションの現在のユーザー
 * セッション開始時に1度だけ作られ、以後変更されない
 */
export interface Principal {
  readonly id: number;
  /** レコードのメールアドレス */
  readonly identity: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly displayName: string;
  readonly capability: Capability;
}

/** SQL安全性検証の実行方式 */
export type SafetyMode = 'separate' | 'combined' | 'off';

/**
 * オーケストレーターのステージ構成
 * 認可ステージとスコープゲートは常に有効
 */
export interface StageProfile {
  readonly safety: SafetyMode;
  readonly sanitization: boolean;
  readonly fallback: boolean;
}

export const DEFAULT_STAGE_PROFILE: StageProfile = {
  safety: 'separate',
  sanitization: true,
  fallback: true,
};

/** 保存対象のユーザーレコード（id/created_at はストア側で採番） */
export interface UserRecord {
  readonly firstName: string;
  readonly lastName: string;
  readonly email: string;
  readonly phoneNumber: string | null;
  readonly dateOfBirth: string | null;
  readonly address: string | null;
  readonly ssn: string | null;
}
