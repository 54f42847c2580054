export class Metrics {
    private counters = {
        evaluations: 0,
        alerts_raised: 0,
        entries_rejected: 0,
        files_rejected: 0,
    };

    incrementEvaluations(): void {
        this.counters.evaluations++;
    }

    addAlertsRaised(count: number): void {
        this.counters.alerts_raised += count;
    }

    incrementEntriesRejected(): void {
        this.counters.entries_rejected++;
    }

    incrementFilesRejected(): void {
        this.counters.files_rejected++;
    }

    getCounters() {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = {
            evaluations: 0,
            alerts_raised: 0,
            entries_rejected: 0,
            files_rejected: 0,
        };
    }
}
