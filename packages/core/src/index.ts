/**
 * @pkgpost/core
 *
 * 레지스트리 인증 협력자: 자격 증명, 토큰 갱신, 인증된 HTTP 클라이언트
 */
export * from './oauth/index.js';
