import type { AuctionSnapshot, BidOutcome, BidResponse, QueryResponse } from "@bidmesh/schemas";

export function toBidResponse(outcome: BidOutcome): BidResponse {
  switch (outcome.kind) {
    case "success": return { outcome: "success" };
    case "rejected": return { outcome: "fail", reason: outcome.reason };
    case "auction_ended": return { outcome: "auction ended" };
  }
}

export function toQueryResponse(snapshot: AuctionSnapshot): QueryResponse {
  const response: QueryResponse = {
    status: snapshot.status,
    highest_bid: snapshot.highestBid,
    highest_bidder: snapshot.highestBidder,
    time_remaining: snapshot.timeRemaining,
  };
  if (snapshot.winner !== undefined) {
    response.winner = snapshot.winner;
  }
  return response;
}
