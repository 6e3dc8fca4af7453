import { type ResourceFixture, resourceDocument } from "@graphwire/test-utils";

export const ADA: ResourceFixture = { type: "people", id: "9", attributes: { name: "Ada" } };

/**
 * Article whose author and reviewer are the same included person, with two
 * comments written by that person as well.
 */
export const sharedAuthorDocument = resourceDocument(
  {
    type: "articles",
    id: "1",
    attributes: { title: "Graphs" },
    relationships: {
      author: { data: { type: "people", id: "9" } },
      reviewer: { data: { type: "people", id: "9" } },
      comments: {
        data: [
          { type: "comments", id: "c1" },
          { type: "comments", id: "c2" },
        ],
      },
    },
  },
  {
    included: [
      ADA,
      {
        type: "comments",
        id: "c1",
        attributes: { body: "first" },
        relationships: { author: { data: { type: "people", id: "9" } } },
      },
      {
        type: "comments",
        id: "c2",
        attributes: { body: "second" },
        relationships: { author: { data: { type: "people", id: "9" } } },
      },
    ],
  },
);

/**
 * Two people who are each other's friend.
 */
export const friendCycleDocument = resourceDocument(
  {
    type: "people",
    id: "1",
    attributes: { name: "Grace" },
    relationships: { friend: { data: { type: "people", id: "2" } } },
  },
  {
    included: [
      {
        type: "people",
        id: "2",
        attributes: { name: "Alan" },
        relationships: { friend: { data: { type: "people", id: "1" } } },
      },
    ],
  },
);
