import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Subject } from "rxjs";
import {
	DEAL_AGREED_ID,
	DEAL_TIMEOUT_ID,
	type DealAgreed,
	type DealTimeout,
	JOB_CREATOR_AGREED_ID,
	type JobCreatorAgreed,
	RESOURCE_PROVIDER_AGREED_ID,
	RESULT_ACCEPTED_ID,
	RESULT_ADDED_ID,
	RESULT_REJECTED_ID,
	type ResourceProviderAgreed,
	type ResultAccepted,
	type ResultAdded,
	type ResultRejected,
} from "./deal.event";

export type DealSse = {
	type:
		| "resource_provider_agreed"
		| "job_creator_agreed"
		| "deal_agreed"
		| "result_added"
		| "deal_timed_out"
		| "result_accepted"
		| "result_rejected";
	dealId: string;
	eventId: string;
};

export type SseEvent<T = DealSse> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<DealSse>();

	get adminEvents() {
		return this.events$.asObservable();
	}

	dealEvents(dealId?: string) {
		if (dealId) {
			return this.events$.pipe(filter((e) => e.dealId === dealId));
		}
		return this.events$.asObservable();
	}

	@OnEvent(RESOURCE_PROVIDER_AGREED_ID)
	onResourceProviderAgreed(evt: ResourceProviderAgreed) {
		this.push("resource_provider_agreed", evt);
	}

	@OnEvent(JOB_CREATOR_AGREED_ID)
	onJobCreatorAgreed(evt: JobCreatorAgreed) {
		this.push("job_creator_agreed", evt);
	}

	@OnEvent(DEAL_AGREED_ID)
	onDealAgreed(evt: DealAgreed) {
		this.push("deal_agreed", evt);
	}

	@OnEvent(RESULT_ADDED_ID)
	onResultAdded(evt: ResultAdded) {
		this.push("result_added", evt);
	}

	@OnEvent(DEAL_TIMEOUT_ID)
	onDealTimeout(evt: DealTimeout) {
		this.push("deal_timed_out", evt);
	}

	@OnEvent(RESULT_ACCEPTED_ID)
	onResultAccepted(evt: ResultAccepted) {
		this.push("result_accepted", evt);
	}

	@OnEvent(RESULT_REJECTED_ID)
	onResultRejected(evt: ResultRejected) {
		this.push("result_rejected", evt);
	}

	private push(type: DealSse["type"], evt: { dealId: string; eventId: string }) {
		this.events$.next({ type, dealId: evt.dealId, eventId: evt.eventId });
	}
}
