/**
 * Utility for per-stage pipeline timing logs.
 * Enabled via DEBUG_PIPELINE_AUDIT environment variable.
 */
export class PipelineAuditLogger {
    private static isEnabled(): boolean {
        return process.env['DEBUG_PIPELINE_AUDIT'] === 'true';
    }

    /**
     * Stage timing helper
     */
    public static stage(analysisLabel: string, stage: string, startedAt: number) {
        if (this.isEnabled()) {
            console.log(` ⏱️ [STAGE] ${analysisLabel} ${stage}: ${Date.now() - startedAt}ms`);
        }
    }
}
