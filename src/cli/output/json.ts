// ============================================================================
// JSON Output - JSON 格式输出
// ============================================================================

import type { SaverError } from '../../main/errors';

/**
 * JSON 输出管理器
 */
export class JSONOutput {
  /**
   * 输出最终结果
   */
  result(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * 输出错误
   */
  error(message: string, code?: string): void {
    console.error(JSON.stringify({
      success: false,
      error: message,
      code,
    }));
  }

  failure(error: SaverError): void {
    console.error(JSON.stringify({ success: false, error: error.toJSON() }));
  }
}

// 导出单例
export const jsonOutput = new JSONOutput();
