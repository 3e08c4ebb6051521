import { computeRecordName, inferRecordType } from "./dns-record.util";

describe("dns-record.util", () => {
  describe("computeRecordName", () => {
    it("strips the zone suffix from a subdomain", () => {
      expect(computeRecordName("sub.example.com", "example.com")).toBe("sub");
    });

    it("uses the apex marker for the zone itself", () => {
      expect(computeRecordName("example.com", "example.com")).toBe("@");
    });

    it("keeps a domain outside the zone unchanged", () => {
      expect(computeRecordName("other.org", "example.com")).toBe("other.org");
    });

    it("keeps the FQDN when no zone is known", () => {
      expect(computeRecordName("sub.example.com", "")).toBe("sub.example.com");
    });

    it("compares case-insensitively and keeps the domain's own casing", () => {
      expect(computeRecordName("Edge.CDN.Example.COM", "example.com")).toBe(
        "Edge.CDN",
      );
      expect(computeRecordName("EXAMPLE.com", " Example.Com ")).toBe("@");
    });

    it("does not strip a suffix that is not on a label boundary", () => {
      expect(computeRecordName("myexample.com", "example.com")).toBe(
        "myexample.com",
      );
    });
  });

  describe("inferRecordType", () => {
    it("classifies IPv4 endpoints as A", () => {
      expect(inferRecordType("198.51.100.7")).toBe("A");
    });

    it("classifies anything with a colon as AAAA", () => {
      expect(inferRecordType("2001:db8::1")).toBe("AAAA");
    });

    it("passes malformed endpoints through without validation", () => {
      expect(inferRecordType("not-an-ip")).toBe("A");
    });
  });
});
