/**
 * HTTP Security Headers Middleware
 *
 * ヘルスチェック用エンドポイントに付与するセキュリティヘッダー。
 * レスポンスはキャッシュさせない
 */

import { NextFunction } from 'express';

/**
 * ヘッダーを書き込めるレスポンス（express の Response が満たす）
 */
export interface HeaderTarget {
  setHeader(name: string, value: string): unknown;
  removeHeader(name: string): void;
}

/**
 * セキュリティヘッダー設定オプション
 */
export interface SecurityHeadersOptions {
  /** X-Frame-Options */
  xFrameOptions?: 'DENY' | 'SAMEORIGIN' | false;
  /** X-Content-Type-Options */
  noSniff?: boolean;
  /** Cache-Control */
  cacheControl?: string | false;
  /** Referrer-Policy */
  referrerPolicy?: string | false;
}

/**
 * デフォルト設定
 */
const DEFAULT_OPTIONS: Required<SecurityHeadersOptions> = {
  xFrameOptions: 'DENY',
  noSniff: true,
  cacheControl: 'no-store',
  referrerPolicy: 'no-referrer',
};

/**
 * セキュリティヘッダーミドルウェアを作成
 *
 * @example
 * ```typescript
 * const app = express();
 * app.use(securityHeaders());
 * ```
 */
export const securityHeaders = (
  options: SecurityHeadersOptions = {}
): ((req: unknown, res: HeaderTarget, next: NextFunction) => void) => {
  const config = { ...DEFAULT_OPTIONS, ...options };

  return (_req: unknown, res: HeaderTarget, next: NextFunction) => {
    if (config.xFrameOptions) {
      res.setHeader('X-Frame-Options', config.xFrameOptions);
    }

    if (config.noSniff) {
      res.setHeader('X-Content-Type-Options', 'nosniff');
    }

    if (config.cacheControl) {
      res.setHeader('Cache-Control', config.cacheControl);
    }

    if (config.referrerPolicy) {
      res.setHeader('Referrer-Policy', config.referrerPolicy);
    }

    // セキュリティ情報の漏洩を防ぐ
    res.removeHeader('X-Powered-By');

    next();
  };
};
